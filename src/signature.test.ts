import { describe, expect, it } from 'vitest';
import { callSignature } from './signature.js';
import { createHash } from 'node:crypto';
import { checksumFrom } from './utils/hash.js';

const route = '/compute/pca';
const payload = { data: [[1, 2], [3, 4]], n_components: 2 };

describe('callSignature', () => {
  it('is deterministic for the same payload', () => {
    expect(callSignature(route, payload)).toBe(callSignature(route, payload));
  });

  it('ignores key insertion order', () => {
    const reordered = { n_components: 2, data: [[1, 2], [3, 4]] };
    expect(callSignature(route, reordered)).toBe(callSignature(route, payload));
  });

  it('changes when any leaf value changes', () => {
    const changed = { data: [[1, 2], [3, 5]], n_components: 2 };
    expect(callSignature(route, changed)).not.toBe(callSignature(route, payload));
  });

  it('prefixes the route to the payload digest by default', () => {
    expect(callSignature(route, payload)).toBe(`${route}${checksumFrom(payload)}`);
  });

  it('defaults the payload to an empty object', () => {
    expect(callSignature('/status')).toBe(`/status${checksumFrom({})}`);
  });

  it('returns a pre-computed signature unchanged', () => {
    expect(callSignature(route, payload, { pregiven: 'forced-key' })).toBe('forced-key');
    expect(callSignature(route, payload, { pregiven: '' })).toBe('');
  });

  it('shares one signature across routes in payload mode', () => {
    const first = callSignature('/compute/pca', payload, { mode: 'payload' });
    const second = callSignature('/compute/ts/prophet', payload, { mode: 'payload' });
    expect(first).toBe(second);
    expect(first).toBe(checksumFrom(payload));
  });

  it('binds the digest to the route in strict mode', () => {
    const strict = callSignature(route, payload, { mode: 'strict' });
    const canonical = '{"data":[[1,2],[3,4]],"n_components":2}';
    const digest = createHash('sha256').update(`${route}\n${canonical}`).digest('hex');
    expect(strict).toBe(`${route}${digest}`);
    expect(strict).not.toBe(callSignature(route, payload));
  });

  it('gives different strict signatures to routes sharing a payload', () => {
    const pca = callSignature('/compute/pca', { n: 1 }, { mode: 'strict' });
    const prophet = callSignature('/compute/ts/prophet', { n: 1 }, { mode: 'strict' });
    expect(pca.slice('/compute/pca'.length)).not.toBe(prophet.slice('/compute/ts/prophet'.length));
  });
});
