import { canonicalize, checksumFrom, digestText } from './utils/hash.js';
import type { JsonValue, SignatureMode } from './types/index.js';

export interface SignatureOptions {
  /** Returned unchanged when set, e.g. to force a cache key. */
  pregiven?: string | undefined;
  mode?: SignatureMode;
}

/**
 * Derives the request signature that doubles as the cache key.
 *
 * - `prefixed`: the route followed by the SHA-256 of the canonical payload.
 *   The route is not hashed.
 * - `payload`: only the payload digest, so every route sending the same payload
 *   shares one cache entry.
 * - `strict`: the route followed by the SHA-256 of `route + '\n' + canonical payload`.
 */
export function callSignature(
  route: string,
  payload: JsonValue = {},
  options: SignatureOptions = {},
): string {
  if (options.pregiven !== undefined) {
    return options.pregiven;
  }

  switch (options.mode ?? 'prefixed') {
    case 'payload':
      return checksumFrom(payload);
    case 'strict':
      return `${route}${digestText(`${route}\n${canonicalize(payload)}`)}`;
    case 'prefixed':
      return `${route}${checksumFrom(payload)}`;
  }
}
