export { EconopsClient, type EconopsClientOptions, type FetchLike, type RequestOptions } from './clients/econops.js';
export { callSignature, type SignatureOptions } from './signature.js';
export { FileCache, DEFAULT_CACHE_DIR, sanitizeSignature, type FileCacheOptions } from './cache/fileCache.js';
export type { CacheEntry, CacheResult, CacheStats, ResponseCache } from './cache/cache.js';
export {
  DEFAULT_BASE_URL,
  TOKEN_ENV_VAR,
  resolveClientConfig,
  type ClientConfig,
  type ClientConfigInput,
  type Environment,
} from './config.js';
export { CacheError, ConfigurationError, EconopsError, NetworkError, SerializationError } from './errors.js';
export { canonicalize, checksumFrom } from './utils/hash.js';
export { createLogger, type Logger } from './utils/logger.js';
export type { ApiResponse, HttpMethod, JsonObject, JsonPrimitive, JsonValue, SignatureMode } from './types/index.js';
