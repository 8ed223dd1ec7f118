/**
 * Shared-secret check for socket connects
 */

import { timingSafeEqual } from 'crypto';

export function isValidToken(
  expected: string,
  provided: string | null | undefined
): boolean {
  if (!provided) {
    return false;
  }
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

export type UpgradeDecision =
  | { accept: true }
  | { accept: false; status: 401 | 404; reason: string };

/**
 * Decide whether an HTTP upgrade request may open a socket
 */
export function authorizeUpgrade(
  requestUrl: string | undefined,
  options: { path: string; token: string }
): UpgradeDecision {
  const url = new URL(requestUrl ?? '/', 'http://localhost');
  if (url.pathname !== options.path) {
    return { accept: false, status: 404, reason: 'Not Found' };
  }
  if (!isValidToken(options.token, url.searchParams.get('token'))) {
    return { accept: false, status: 401, reason: 'Unauthorized' };
  }
  return { accept: true };
}
