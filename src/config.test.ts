import { describe, expect, it } from 'vitest';
import { DEFAULT_CACHE_DIR } from './cache/fileCache.js';
import { DEFAULT_BASE_URL, resolveClientConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('resolveClientConfig', () => {
  it('prefers an explicit token over the environment', () => {
    const config = resolveClientConfig({ token: 'test-token' }, { ECONOPS_TOKEN: 'env-token' });
    expect(config.token).toBe('test-token');
  });

  it('reads the token from the environment', () => {
    expect(resolveClientConfig({}, { ECONOPS_TOKEN: 'env-token' }).token).toBe('env-token');
  });

  it('uses the fallback token last', () => {
    expect(resolveClientConfig({ fallbackToken: 'demo' }, {}).token).toBe('demo');
  });

  it('throws ConfigurationError when no token can be found', () => {
    expect(() => resolveClientConfig({}, {})).toThrow(ConfigurationError);
    expect(() => resolveClientConfig({ token: '' }, {})).toThrow(
      "Token not provided and 'ECONOPS_TOKEN' environment variable not found",
    );
  });

  it('applies defaults', () => {
    const config = resolveClientConfig({ token: 'test-token' }, {});
    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.useCache).toBe(true);
    expect(config.cacheDir).toBe(DEFAULT_CACHE_DIR);
    expect(config.signatureMode).toBe('prefixed');
  });

  it('strips a trailing slash from the base url', () => {
    expect(resolveClientConfig({ token: 't', baseUrl: 'https://custom.example/' }, {}).baseUrl).toBe(
      'https://custom.example',
    );
    expect(resolveClientConfig({ token: 't' }, { ECONOPS_BASE_URL: 'http://localhost:8000/' }).baseUrl).toBe(
      'http://localhost:8000',
    );
  });

  it('reads cache settings from the environment', () => {
    const config = resolveClientConfig({ token: 't' }, { ECONOPS_NO_CACHE: 'TRUE', ECONOPS_CACHE_DIR: '/tmp/econops-test' });
    expect(config.useCache).toBe(false);
    expect(config.cacheDir).toBe('/tmp/econops-test');
    expect(resolveClientConfig({ token: 't', useCache: true }, { ECONOPS_NO_CACHE: '1' }).useCache).toBe(true);
  });

  it('verifies TLS by default and honours ECONOPS_INSECURE', () => {
    expect(resolveClientConfig({ token: 't' }, {}).verifyTls).toBe(true);
    expect(resolveClientConfig({ token: 't' }, { ECONOPS_INSECURE: 'yes' }).verifyTls).toBe(false);
    expect(resolveClientConfig({ token: 't', verifyTls: true }, { ECONOPS_INSECURE: '1' }).verifyTls).toBe(true);
  });

  it('builds authorization headers that custom headers cannot override', () => {
    const config = resolveClientConfig(
      { token: 'test-token', headers: { 'X-Trace': 'abc', Authorization: 'Basic nope' } },
      {},
    );
    expect(config.headers).toEqual({
      'X-Trace': 'abc',
      Authorization: 'Bearer test-token',
      'Content-Type': 'application/json',
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.headers)).toBe(true);
  });
});
