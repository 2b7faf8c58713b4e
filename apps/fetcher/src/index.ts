export { toIntegrity, fromIntegrity, isDigestAlgorithm, type DigestAlgorithm } from './addons/hash.js'
export { resolveLocalized } from './addons/locale.js'
export { isEligibleAddon, PUBLIC_STATUS } from './addons/filter.js'
export { mapAddonRecord } from './addons/mapper.js'
export {
  createPageFetcher,
  buildSearchUrl,
  type FetchPage,
  type PageFetcherOptions,
  type SearchQuery,
} from './addons/page-fetcher.js'
export {
  collectAddonPages,
  resolveLastPage,
  type CollectPagesOptions,
  type PaginationResult,
} from './addons/paginate.js'
export { aggregateAddons, compareByPname, serializeAddons, type AggregateResult } from './addons/aggregate.js'
export { runAddonsFetch, type AddonsRunSummary, type RunDependencies } from './addons/run.js'
export type {
  AddonMeta,
  AddonRecord,
  OutputRecord,
  RawAddonRecord,
  RawSearchEnvelope,
  SearchPage,
  LocalizedText,
} from './addons/types.js'
export { loadFetchConfig, fetchConfigSchema, type FetchConfig } from './config/index.js'
export { fileSink, streamSink, type OutputSink } from './kit/output.js'
export * from './errors.js'
