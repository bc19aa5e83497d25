import { randomInt } from 'node:crypto';

export const REQUEST_ID_HEADER = 'X-Request-Id';
export const USER_IDENTITY_HEADER = 'User-Identity';

export const DEFAULT_REQUEST_ID_LENGTH = 20;

const REQUEST_ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export function newRequestId(length: number = DEFAULT_REQUEST_ID_LENGTH): string {
  let id = '';
  for (let i = 0; i < length; i += 1) {
    id += REQUEST_ID_ALPHABET[randomInt(REQUEST_ID_ALPHABET.length)];
  }
  return id;
}

/**
 * Appends a freshly generated segment to an upstream correlation chain.
 *
 * Without an upstream chain the result is a single 20 character id. With one,
 * the new segment is half as long as the first upstream segment (or half the
 * whole chain when its first comma sits at index 0 or 1), so ids shrink as
 * they travel further from the originating service.
 *
 * @example
 * ```typescript
 * buildCorrelationChain();            // "Xk3...", 20 chars
 * buildCorrelationChain('call1234');  // "call1234,ab3d"
 * buildCorrelationChain('abcdef,gh'); // "abcdef,gh,x9Q"
 * ```
 */
export function buildCorrelationChain(upstream?: string): string {
  if (!upstream) {
    return newRequestId(DEFAULT_REQUEST_ID_LENGTH);
  }

  let addedLength = Math.floor(upstream.length / 2);
  const commaPosition = upstream.indexOf(',');
  if (commaPosition > 1) {
    addedLength = Math.floor(commaPosition / 2);
  }

  return `${upstream},${newRequestId(addedLength)}`;
}

export function applyCorrelationHeader(headers: Headers, chain: string): void {
  headers.set(REQUEST_ID_HEADER, chain);
}

/** Sets the user identity header unless one is already present. */
export function applyUserIdentityHeader(headers: Headers, userIdentity?: string): void {
  if (!userIdentity) return;
  if (headers.get(USER_IDENTITY_HEADER)) return;
  headers.set(USER_IDENTITY_HEADER, userIdentity);
}
