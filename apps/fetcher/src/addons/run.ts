import { type ILogger, silentLogger } from '@addons-feed/logger'
import type { FetchConfig } from '../config/index.js'
import type { FetchFn } from '../kit/http.js'
import type { OutputSink } from '../kit/output.js'
import { aggregateAddons, serializeAddons } from './aggregate.js'
import { createPageFetcher } from './page-fetcher.js'
import { collectAddonPages } from './paginate.js'

export interface RunDependencies {
  sink: OutputSink
  logger?: ILogger
  fetchFn?: FetchFn
  now?: () => number
}

export interface AddonsRunSummary {
  status: 'SUCCESS'
  durationMs: number
  pageCount: number
  totalCount: number
  pagesFetched: number
  rawRecords: number
  eligible: number
  excluded: number
  published: number
  output: string
}

/**
 * One complete run: paginate, aggregate, then write the artifact once.
 * Any error propagates before the sink is touched.
 */
export async function runAddonsFetch(config: FetchConfig, deps: RunDependencies): Promise<AddonsRunSummary> {
  const logger = deps.logger ?? silentLogger
  const now = deps.now ?? Date.now
  const startedAt = now()

  logger.info('Starting addons fetch', {
    endpoint: config.endpoint,
    pageSize: config.pageSize,
    pageLimit: config.pageLimit ?? null,
    minUsers: config.minUsers ?? null,
    concurrency: config.concurrency,
  })

  const fetchPage = createPageFetcher(
    {
      lang: config.lang,
      app: config.app,
      type: config.type,
      sort: config.sort,
      pageSize: config.pageSize,
      minUsers: config.minUsers,
    },
    {
      endpoint: config.endpoint,
      timeoutMs: config.timeoutMs,
      fetchFn: deps.fetchFn,
      logger,
    }
  )

  const pagination = await collectAddonPages({
    fetchPage,
    pageLimit: config.pageLimit,
    concurrency: config.concurrency,
    logger,
  })

  const aggregate = aggregateAddons(pagination.records, logger)
  await deps.sink.write(serializeAddons(aggregate.records))

  const summary: AddonsRunSummary = {
    status: 'SUCCESS',
    durationMs: now() - startedAt,
    pageCount: pagination.pageCount,
    totalCount: pagination.totalCount,
    pagesFetched: pagination.pagesFetched,
    rawRecords: pagination.records.length,
    eligible: aggregate.eligible,
    excluded: aggregate.excluded,
    published: aggregate.records.length,
    output: deps.sink.description,
  }
  logger.info('ADDONS_RUN_SUMMARY', { ...summary })

  return summary
}
