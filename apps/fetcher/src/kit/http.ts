/**
 * Single-attempt HTTP GET on native fetch.
 *
 * Never retries and never throws: the caller decides what a failed request
 * means. A request ends in exactly one of four states: ok, error (transport
 * failure or non-2xx status), timeout, or aborted by the caller's signal.
 */

export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': 'addons-feed/0.1.0',
  Accept: 'application/json',
} as const

export const DEFAULT_TIMEOUT_MS = 30000

export type FetchFn = typeof fetch

export interface FetchTextOptions {
  /** Request timeout in ms, covering both headers and body */
  timeoutMs?: number

  /** Cancels the request when aborted */
  signal?: AbortSignal

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  /** Override for tests */
  fetchFn?: FetchFn
}

export type FetchTextResult =
  | { status: 'ok'; statusCode: number; body: string; durationMs: number }
  | { status: 'error'; statusCode?: number; error: string; cause?: unknown; durationMs: number }
  | { status: 'timeout' | 'aborted'; error: string; durationMs: number }

export async function fetchText(url: string, options: FetchTextOptions = {}): Promise<FetchTextResult> {
  const startTime = Date.now()
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const fetchFn = options.fetchFn ?? globalThis.fetch

  if (options.signal?.aborted) {
    return { status: 'aborted', error: 'Request cancelled before dispatch', durationMs: 0 }
  }

  const controller = new AbortController()
  let timedOut = false
  const timeoutId = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  const onAbort = (): void => controller.abort()
  options.signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const response = await fetchFn(url, {
      method: 'GET',
      headers: { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) },
      signal: controller.signal,
      redirect: 'follow',
    })

    if (!response.ok) {
      return {
        status: 'error',
        statusCode: response.status,
        error: `HTTP ${response.status}: ${response.statusText}`,
        durationMs: Date.now() - startTime,
      }
    }

    const body = await response.text()
    return {
      status: 'ok',
      statusCode: response.status,
      body,
      durationMs: Date.now() - startTime,
    }
  } catch (error) {
    if (timedOut) {
      return {
        status: 'timeout',
        error: `Request timed out after ${timeoutMs}ms`,
        durationMs: Date.now() - startTime,
      }
    }
    if (controller.signal.aborted) {
      return {
        status: 'aborted',
        error: 'Request cancelled',
        durationMs: Date.now() - startTime,
      }
    }
    return {
      status: 'error',
      error: error instanceof Error ? error.message : String(error),
      cause: error,
      durationMs: Date.now() - startTime,
    }
  } finally {
    clearTimeout(timeoutId)
    options.signal?.removeEventListener('abort', onAbort)
  }
}
