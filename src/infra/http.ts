import { AuthenticationError, SourceError, TransientProviderError } from "./errors.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export type HttpRequestInit = RequestInit & {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

function describeBody(text: string, status: number): string {
  const trimmed = text.trim().slice(0, 200);
  return trimmed ? `HTTP ${status}: ${trimmed}` : `HTTP ${status}`;
}

/**
 * Fetches JSON from a source API and maps failures onto the error taxonomy:
 * network errors, timeouts, 429 and 5xx are transient; 401/403 are
 * authentication failures; any other non-2xx is a SourceError.
 */
export async function requestJson<T>(source: string, url: string, init: HttpRequestInit = {}): Promise<T> {
  const { timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS, fetchImpl = fetch, ...rest } = init;
  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(), timeoutMs);

  let res: Response;
  try {
    res = await fetchImpl(url, { ...rest, signal: ctrl.signal });
  } catch (err) {
    const aborted = ctrl.signal.aborted;
    throw new TransientProviderError(
      aborted ? `request timed out after ${timeoutMs}ms` : `network error: ${err instanceof Error ? err.message : String(err)}`,
      source,
    );
  } finally {
    clearTimeout(timer);
  }

  if (res.status === 401 || res.status === 403) {
    const text = await res.text().catch(() => "");
    throw new AuthenticationError(describeBody(text, res.status), source);
  }
  if (res.status === 429 || res.status >= 500) {
    const text = await res.text().catch(() => "");
    throw new TransientProviderError(describeBody(text, res.status), source, res.status);
  }
  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new SourceError(describeBody(text, res.status), source, res.status);
  }

  try {
    return (await res.json()) as T;
  } catch {
    throw new SourceError(`invalid JSON in HTTP ${res.status} response`, source, res.status);
  }
}
