import { Agent } from 'undici';
import { FileCache } from '../cache/fileCache.js';
import { resolveClientConfig, type ClientConfig, type ClientConfigInput, type Environment } from '../config.js';
import { NetworkError } from '../errors.js';
import { callSignature } from '../signature.js';
import { isJsonValue } from '../utils/json.js';
import type { CacheEntry, CacheStats, ResponseCache } from '../cache/cache.js';
import type { ApiResponse, HttpMethod, JsonObject, JsonValue } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface EconopsClientOptions extends ClientConfigInput {
  cache?: ResponseCache;
  fetch?: FetchLike;
  env?: Environment;
  logger?: Logger;
}

export interface RequestOptions {
  method?: HttpMethod;
  /** Pre-computed signature; skips generation and forces the cache key. */
  signature?: string;
}

/**
 * Client for the EconOps computation API.
 *
 * @example
 * ```ts
 * const client = new EconopsClient({ token: process.env.ECONOPS_TOKEN });
 * const response = await client.request('/compute/pca', {
 *   data: [[1, 2, 3], [4, 5, 6], [7, 8, 9]],
 *   n_components: 2,
 * });
 * if (response.status === 200) {
 *   console.log(response.data);
 * }
 * console.log(await client.cacheInfo());
 * await client.close();
 * ```
 */
export class EconopsClient {
  readonly config: ClientConfig;
  private readonly cache: ResponseCache;
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger | undefined;
  private readonly insecureAgent: Agent | undefined;

  constructor(options: EconopsClientOptions = {}) {
    this.config = resolveClientConfig(options, options.env);
    this.logger = options.logger;
    this.cache = options.cache ?? new FileCache({ directory: this.config.cacheDir, logger: this.logger });
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.insecureAgent = this.config.verifyTls ? undefined : new Agent({ connect: { rejectUnauthorized: false } });
  }

  /**
   * Calls `route` with bearer authentication. Payload-carrying calls are always
   * sent as POST with the signature in the body; the cache is read only for GET
   * or payload-less calls but written after every successful response.
   */
  async request(route: string, payload?: JsonObject, options: RequestOptions = {}): Promise<ApiResponse> {
    const requestedMethod = options.method ?? 'POST';
    const signature = callSignature(route, payload ?? {}, {
      pregiven: options.signature,
      mode: this.config.signatureMode,
    });

    if (this.config.useCache && (requestedMethod === 'GET' || payload === undefined)) {
      const cached = await this.cache.get(signature);
      if (!cached.ok) {
        this.logger?.(`${cached.error.message}; treating as a miss.`);
      } else if (cached.value) {
        this.logger?.(`Cache hit for ${route}`);
        return fromCacheEntry(cached.value, signature);
      }
    }

    const method: HttpMethod = payload !== undefined ? 'POST' : requestedMethod;
    const url = `${this.config.baseUrl}${route}`;
    const init: RequestInit = { method, headers: { ...this.config.headers } };
    if (this.insecureAgent) {
      init.dispatcher = this.insecureAgent;
    }
    if (method !== 'GET') {
      init.body = JSON.stringify({ ...payload, signature });
    }

    this.logger?.(`${method} ${url}`);
    let status: number;
    let body: string;
    let headers: Record<string, string>;
    try {
      const response = await this.fetchFn(url, init);
      status = response.status;
      headers = headersToRecord(response.headers);
      body = await response.text();
    } catch (error) {
      throw new NetworkError(url, error);
    }

    const data = parseJson(body);
    if (this.config.useCache && status === 200) {
      if (data === undefined) {
        this.logger?.(`Warning: Failed to parse response for caching from ${route}`);
      } else {
        const stored = await this.cache.put(signature, { statusCode: status, data, headers });
        if (!stored.ok) {
          this.logger?.(`${stored.error.message}; response not cached.`);
        }
      }
    }

    return {
      status,
      ok: status >= 200 && status < 300,
      headers,
      body,
      data,
      fromCache: false,
      signature,
    };
  }

  get(route: string, payload?: JsonObject, method: HttpMethod = 'POST'): Promise<ApiResponse> {
    return this.request(route, payload, { method });
  }

  async clearCache(): Promise<number> {
    const cleared = await this.cache.clear();
    if (!cleared.ok) {
      throw cleared.error;
    }
    return cleared.value;
  }

  cacheInfo(): Promise<CacheStats> {
    return this.cache.stats();
  }

  /** Releases the connections held when TLS verification is off. */
  async close(): Promise<void> {
    await this.insecureAgent?.close();
  }
}

function fromCacheEntry(entry: CacheEntry, signature: string): ApiResponse {
  return {
    status: entry.statusCode,
    ok: entry.statusCode >= 200 && entry.statusCode < 300,
    headers: entry.headers,
    body: JSON.stringify(entry.data),
    data: entry.data,
    fromCache: true,
    signature,
  };
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

function parseJson(text: string): JsonValue | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}
