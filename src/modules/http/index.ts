/**
 * Minimal JSON-over-fetch helper shared by the remote collaborators.
 *
 * Transport failures (DNS, reset, per-request timeout) reject with the
 * underlying error; any HTTP status resolves so callers can classify it.
 */

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
  timeoutMs?: number;
  signal?: AbortSignal;
}

const DEFAULT_TIMEOUT_MS = 30000;

export function combineSignals(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export async function requestJson(url: string, options: RequestOptions = {}): Promise<JsonResponse> {
  const response = await fetch(url, {
    method: options.method ?? 'GET',
    headers: options.headers,
    body: options.body,
    signal: combineSignals(options.timeoutMs ?? DEFAULT_TIMEOUT_MS, options.signal),
  });

  const text = await response.text();
  let body: unknown = null;
  if (text.length > 0) {
    try {
      body = JSON.parse(text);
    } catch {
      // Non-JSON bodies (gateway error pages) are kept as text for diagnostics
      body = text;
    }
  }

  return { status: response.status, ok: response.ok, body };
}

/**
 * Whether an HTTP status is worth retrying
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
