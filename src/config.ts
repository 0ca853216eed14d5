import { ConfigurationError } from './errors.js';
import { DEFAULT_CACHE_DIR } from './cache/fileCache.js';
import type { SignatureMode } from './types/index.js';

export const DEFAULT_BASE_URL = 'https://econops.com:8000';
export const TOKEN_ENV_VAR = 'ECONOPS_TOKEN';

export type Environment = Record<string, string | undefined>;

export interface ClientConfigInput {
  token?: string | undefined;
  fallbackToken?: string | undefined;
  baseUrl?: string | undefined;
  useCache?: boolean | undefined;
  cacheDir?: string | undefined;
  headers?: Record<string, string> | undefined;
  signatureMode?: SignatureMode | undefined;
  verifyTls?: boolean | undefined;
}

export interface ClientConfig {
  readonly token: string;
  readonly baseUrl: string;
  readonly useCache: boolean;
  readonly cacheDir: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly signatureMode: SignatureMode;
  readonly verifyTls: boolean;
}

export function resolveClientConfig(input: ClientConfigInput = {}, env: Environment = process.env): ClientConfig {
  const token = input.token ?? env[TOKEN_ENV_VAR] ?? input.fallbackToken;
  if (!token) {
    throw new ConfigurationError(`Token not provided and '${TOKEN_ENV_VAR}' environment variable not found`);
  }

  const baseUrl = (input.baseUrl ?? env.ECONOPS_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/$/, '');
  const useCache = input.useCache ?? !isTruthy(env.ECONOPS_NO_CACHE);
  const cacheDir = input.cacheDir ?? env.ECONOPS_CACHE_DIR ?? DEFAULT_CACHE_DIR;
  const verifyTls = input.verifyTls ?? !isTruthy(env.ECONOPS_INSECURE);

  return Object.freeze({
    token,
    baseUrl,
    useCache,
    cacheDir,
    headers: Object.freeze({
      ...input.headers,
      Authorization: `Bearer ${token}`,
      'Content-Type': 'application/json',
    }),
    signatureMode: input.signatureMode ?? 'prefixed',
    verifyTls,
  });
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}
