import { type ILogger, silentLogger } from '@addons-feed/logger'
import { FetchError, MalformedEnvelopeError } from '../errors.js'
import { type FetchFn, type FetchTextResult, fetchText } from '../kit/http.js'
import { safeJsonParse } from '../kit/json.js'
import { type SearchPage, searchEnvelopeSchema } from './types.js'

/** Query parameters shared by every page request of a run. */
export interface SearchQuery {
  lang: string
  app: string
  type: string
  sort: string
  pageSize: number
  /** Sent as `users__gt` only when set */
  minUsers?: number
}

export interface PageFetcherOptions {
  endpoint: string
  timeoutMs?: number
  fetchFn?: FetchFn
  logger?: ILogger
}

export type FetchPage = (page: number, signal?: AbortSignal) => Promise<SearchPage>

export function buildSearchUrl(endpoint: string, query: SearchQuery, page: number): string {
  const url = new URL(endpoint)
  url.searchParams.set('lang', query.lang)
  url.searchParams.set('app', query.app)
  url.searchParams.set('type', query.type)
  url.searchParams.set('sort', query.sort)
  url.searchParams.set('page_size', String(query.pageSize))
  url.searchParams.set('page', String(page))
  if (query.minUsers !== undefined) {
    url.searchParams.set('users__gt', String(query.minUsers))
  }
  return url.toString()
}

function toFetchError(page: number, result: Exclude<FetchTextResult, { status: 'ok' }>): FetchError {
  const message = `Page ${page}: ${result.error}`
  switch (result.status) {
    case 'timeout':
      return new FetchError(message, { page, timedOut: true })
    case 'aborted':
      return new FetchError(message, { page })
    case 'error':
      return new FetchError(message, { page, statusCode: result.statusCode, cause: result.cause })
  }
}

/**
 * Create a function that fetches and validates one search page per call.
 * Every failure is thrown as FetchError or MalformedEnvelopeError.
 */
export function createPageFetcher(query: SearchQuery, options: PageFetcherOptions): FetchPage {
  const log = (options.logger ?? silentLogger).child('page-fetcher')

  return async (page, signal) => {
    const url = buildSearchUrl(options.endpoint, query, page)
    log.debug('Fetching search page', { page, url })

    const result = await fetchText(url, {
      timeoutMs: options.timeoutMs,
      signal,
      fetchFn: options.fetchFn,
    })

    if (result.status !== 'ok') {
      throw toFetchError(page, result)
    }

    const parsed = safeJsonParse(result.body)
    if (!parsed.ok) {
      throw new MalformedEnvelopeError(`Page ${page} is not valid JSON: ${parsed.error}`, { page })
    }

    const envelope = searchEnvelopeSchema.safeParse(parsed.value)
    if (!envelope.success) {
      throw new MalformedEnvelopeError(`Page ${page} does not match the search envelope`, {
        page,
        cause: envelope.error,
      })
    }

    log.debug('Search page fetched', {
      page,
      records: envelope.data.results.length,
      pageCount: envelope.data.page_count,
      durationMs: result.durationMs,
    })

    return {
      page,
      pageCount: envelope.data.page_count,
      count: envelope.data.count,
      records: envelope.data.results,
    }
  }
}
