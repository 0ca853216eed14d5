import type { CacheError } from '../errors.js';
import type { JsonValue } from '../types/index.js';

export interface CacheEntry {
  statusCode: number;
  data: JsonValue;
  headers: Record<string, string>;
}

export interface CacheStats {
  directory: string;
  count: number;
  totalBytes: number;
}

export type CacheResult<T> = { ok: true; value: T } | { ok: false; error: CacheError };

/**
 * Best-effort response store. Implementations report failures through the
 * result and never throw; callers decide whether a failure matters.
 */
export interface ResponseCache {
  get(signature: string): Promise<CacheResult<CacheEntry | null>>;
  put(signature: string, entry: CacheEntry): Promise<CacheResult<void>>;
  clear(): Promise<CacheResult<number>>;
  stats(): Promise<CacheStats>;
}
