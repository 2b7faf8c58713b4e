/**
 * Two-phase pagination over the search API.
 *
 * Page 1 is fetched alone because its `page_count` is the only trustworthy
 * upper bound for the run. The remaining pages fan out through a bounded
 * p-limit pool. The first failure aborts every in-flight request and turns
 * every queued task into a no-op; the orchestrator waits for all tasks to
 * settle and then rethrows that first failure. No partial result escapes.
 */

import pLimit from 'p-limit'
import { type ILogger, silentLogger } from '@addons-feed/logger'
import { PaginationBoundError } from '../errors.js'
import type { FetchPage } from './page-fetcher.js'
import type { RawAddonRecord, SearchPage } from './types.js'

export const DEFAULT_CONCURRENCY = 4

export interface CollectPagesOptions {
  fetchPage: FetchPage
  /** Upper limit requested by the caller; unset means every page */
  pageLimit?: number
  concurrency?: number
  logger?: ILogger
}

export interface PaginationResult {
  pageCount: number
  totalCount: number
  pagesFetched: number
  records: RawAddonRecord[]
}

/** Last page to request: the caller's limit, never beyond the discovered page count. */
export function resolveLastPage(pageCount: number, pageLimit?: number): number {
  return Math.min(pageLimit ?? pageCount, pageCount)
}

function assertPageInRange(page: number, pageCount: number): void {
  if (!Number.isInteger(page) || page < 2 || page > pageCount) {
    throw new PaginationBoundError(page, pageCount)
  }
}

export async function collectAddonPages(options: CollectPagesOptions): Promise<PaginationResult> {
  const log = (options.logger ?? silentLogger).child('paginate')
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY

  const first = await options.fetchPage(1)
  const pageCount = first.pageCount
  const lastPage = resolveLastPage(pageCount, options.pageLimit)

  log.info('Discovered page count', {
    pageCount,
    totalCount: first.count,
    lastPage,
    pageLimit: options.pageLimit ?? null,
  })

  if (lastPage <= 1) {
    return {
      pageCount,
      totalCount: first.count,
      pagesFetched: 1,
      records: [...first.records],
    }
  }

  const remaining: number[] = []
  for (let page = 2; page <= lastPage; page++) {
    assertPageInRange(page, pageCount)
    remaining.push(page)
  }

  const pages = new Map<number, SearchPage>([[1, first]])
  const controller = new AbortController()
  const limit = pLimit(concurrency)
  const state: { failure?: { page: number; error: unknown } } = {}

  const fetchOne = async (page: number): Promise<void> => {
    if (controller.signal.aborted) {
      return
    }
    try {
      const result = await options.fetchPage(page, controller.signal)
      if (result.pageCount !== pageCount) {
        log.warn('Page count changed during run', {
          page,
          discoveredPageCount: pageCount,
          reportedPageCount: result.pageCount,
        })
      }
      pages.set(page, result)
    } catch (error) {
      if (state.failure) {
        log.debug('Discarding failure after cancellation', {
          page,
          error: error instanceof Error ? error.message : String(error),
        })
        return
      }
      state.failure = { page, error }
      controller.abort()
      log.warn('Page fetch failed, cancelling outstanding pages', {
        page,
        active: limit.activeCount,
        pending: limit.pendingCount,
      })
    }
  }

  await Promise.all(remaining.map((page) => limit(() => fetchOne(page))))

  if (state.failure) {
    throw state.failure.error
  }

  const records: RawAddonRecord[] = []
  for (let page = 1; page <= lastPage; page++) {
    const result = pages.get(page)
    if (!result) {
      throw new Error(`Page ${page} finished without a result`)
    }
    records.push(...result.records)
  }

  log.info('Collected search pages', { pagesFetched: pages.size, records: records.length })

  return {
    pageCount,
    totalCount: first.count,
    pagesFetched: pages.size,
    records,
  }
}
