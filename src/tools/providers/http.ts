/**
 * Minimal JSON-over-HTTP helper for provider clients
 */

import { UpstreamError } from '@/lib/errors.js';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 15000;

export interface JsonRequestInit {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs?: number;
}

/**
 * Perform a request and parse the JSON body.
 * Non-2xx statuses and network failures raise UpstreamError labelled with
 * the provider name.
 */
export async function requestJson(
  provider: string,
  url: string,
  init: JsonRequestInit = {}
): Promise<unknown> {
  const headers: Record<string, string> = { ...init.headers };
  let body: string | undefined;
  if (init.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(init.body);
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method: init.method ?? 'GET',
      headers,
      body,
      signal: AbortSignal.timeout(init.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'network error';
    throw new UpstreamError(`${provider} request failed: ${reason}`);
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => '');
    throw new UpstreamError(
      `${provider} request failed with status ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`,
      response.status
    );
  }

  return response.json();
}
