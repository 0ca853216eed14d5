import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes scoped messages to stderr when verbose', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('econops', { verbose: true })('POST https://api.test/models');
    expect(stderr).toHaveBeenCalledWith('[econops] POST https://api.test/models');
  });

  it('passes only warnings through when quiet', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = createLogger('econops');

    log('Cache hit for /models');
    log('Warning: Failed to parse response for caching from /health');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledWith('[econops] Warning: Failed to parse response for caching from /health');
  });
});
