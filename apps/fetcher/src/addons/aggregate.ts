import { type ILogger, silentLogger } from '@addons-feed/logger'
import { isEligibleAddon } from './filter.js'
import { mapAddonRecord } from './mapper.js'
import type { OutputRecord, RawAddonRecord } from './types.js'

export interface AggregateResult {
  records: OutputRecord[]
  eligible: number
  excluded: number
}

/** Code-unit order, the same order a plain `<` on strings gives. */
export function compareByPname(a: OutputRecord, b: OutputRecord): number {
  if (a.pname < b.pname) return -1
  if (a.pname > b.pname) return 1
  return 0
}

/**
 * Filter, map and sort every collected record.
 * The first mapping error propagates untouched; nothing is returned for a run with a bad record.
 */
export function aggregateAddons(raw: readonly RawAddonRecord[], logger: ILogger = silentLogger): AggregateResult {
  const log = logger.child('aggregate')
  const records: OutputRecord[] = []
  let excluded = 0

  for (const record of raw) {
    if (!isEligibleAddon(record)) {
      excluded++
      log.debug('Excluding non-public addon', {
        addon: record.guid ?? null,
        status: record.status ?? null,
      })
      continue
    }
    records.push(mapAddonRecord(record))
  }

  records.sort(compareByPname)

  return { records, eligible: records.length, excluded }
}

export function serializeAddons(records: readonly OutputRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`
}
