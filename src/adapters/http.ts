/**
 * Outbound HTTP helper shared by the remote adapters.
 * Applies a bounded timeout and maps every transport problem to
 * RemoteUnavailableError, so callers only deal with the error taxonomy.
 */

import { RemoteUnavailableError, errorMessage, type RemoteName } from '../core/errors.js';

// ============================================================================
// Types
// ============================================================================

export type FetchLike = typeof fetch;

export interface HttpRequest {
  url: string;
  method?: 'GET' | 'POST' | 'PATCH' | 'PUT';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
  /** Shown in error messages instead of the URL when the URL carries a secret. */
  target?: string;
}

export interface HttpResponse {
  status: number;
  text: string;
}

// ============================================================================
// Request
// ============================================================================

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Perform one request. No retries; a timeout counts as unavailable.
 */
export async function httpRequest(
  remote: RemoteName,
  fetchImpl: FetchLike,
  request: HttpRequest
): Promise<HttpResponse> {
  const init: RequestInit = {
    method: request.method ?? 'GET',
    signal: AbortSignal.timeout(request.timeoutMs),
  };
  if (request.headers) {
    init.headers = request.headers;
  }
  if (request.body !== undefined) {
    init.body = request.body;
  }

  try {
    const response = await fetchImpl(request.url, init);
    const text = await response.text();

    if (!response.ok) {
      throw new RemoteUnavailableError(remote, `HTTP ${response.status} from ${request.target ?? request.url}`, response.status);
    }

    return { status: response.status, text };
  } catch (error) {
    if (error instanceof RemoteUnavailableError) {
      throw error;
    }
    if (isTimeout(error)) {
      throw new RemoteUnavailableError(remote, `request timed out after ${request.timeoutMs}ms`);
    }
    throw new RemoteUnavailableError(remote, errorMessage(error));
  }
}

/**
 * Build a Basic authorization header value.
 */
export function basicAuth(user: string, password: string): string {
  return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
}
