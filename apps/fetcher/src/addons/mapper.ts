import { MalformedRecordError, MissingRequiredFieldError } from '../errors.js'
import { toIntegrity } from './hash.js'
import { resolveLocalized } from './locale.js'
import { type Presence, absent, fromNullable } from './presence.js'
import {
  type AddonMeta,
  type AddonRecord,
  type LocalizedText,
  type OutputRecord,
  type RawAddonRecord,
  addonRecordSchema,
} from './types.js'

type MetaPresence<K extends keyof AddonMeta> = Presence<NonNullable<AddonMeta[K]>>

/** Best identifier available for error messages, before the record is known to be valid. */
function describeAddon(record: RawAddonRecord): string | undefined {
  if (typeof record.guid === 'string' && record.guid) return record.guid
  return typeof record.slug === 'string' ? record.slug : undefined
}

function required<T>(value: T | null | undefined, field: string, record: AddonRecord): T {
  if (value === null || value === undefined) {
    throw new MissingRequiredFieldError(field, describeAddon(record))
  }
  return value
}

function promotedCategory(promoted: AddonRecord['promoted']): Presence<string> {
  if (promoted === null || promoted === undefined) {
    return absent
  }
  // Newer API revisions return a list of promotions; the first one is the primary.
  const primary = Array.isArray(promoted) ? promoted[0] : promoted
  return primary ? fromNullable(primary.category) : absent
}

function localizedMeta(
  field: string,
  value: LocalizedText | null | undefined,
  defaultLocale: string
): Presence<string> {
  return value === null || value === undefined ? absent : fromNullable(resolveLocalized(field, value, defaultLocale))
}

function buildMeta(record: AddonRecord, defaultLocale: string): AddonMeta | undefined {
  const file = record.current_version?.file
  const meta: AddonMeta = {}
  let size = 0

  const put = <K extends keyof AddonMeta>(key: K, field: MetaPresence<K>): void => {
    if (field.present) {
      meta[key] = field.value
      size++
    }
  }

  put('homepage', localizedMeta('homepage.url', record.homepage?.url, defaultLocale))
  put('description', localizedMeta('summary', record.summary, defaultLocale))
  put('license', fromNullable(record.current_version?.license?.slug))
  put('permissions', fromNullable(file?.permissions))
  put('hostPermissions', fromNullable(file?.host_permissions))
  put('optionalPermissions', fromNullable(file?.optional_permissions))
  put('requiresPayment', fromNullable(record.requires_payment))
  put('compatibility', fromNullable(record.compatibility?.firefox))
  put('categories', fromNullable(record.categories))
  put('tags', fromNullable(record.tags))
  put('hasEula', fromNullable(record.has_eula))
  put('hasPrivacyPolicy', fromNullable(record.has_privacy_policy))
  put('promotedCategory', promotedCategory(record.promoted))

  return size > 0 ? Object.freeze(meta) : undefined
}

/**
 * Map one eligible search result to its feed record.
 *
 * Throws on a field of the wrong type, then on the first missing required field,
 * missing default-locale value or malformed hash. Optional fields become `meta`
 * keys only when the source has them.
 */
export function mapAddonRecord(raw: RawAddonRecord): OutputRecord {
  const parsed = addonRecordSchema.safeParse(raw)
  if (!parsed.success) {
    throw new MalformedRecordError(describeAddon(raw), parsed.error)
  }
  const record = parsed.data

  const defaultLocale = required(record.default_locale, 'default_locale', record)

  const slug = resolveLocalized('slug', required(record.slug, 'slug', record), defaultLocale)
  const pname = required(slug, 'slug', record)
  const version = required(record.current_version?.version, 'current_version.version', record)
  const url = required(record.current_version?.file?.url, 'current_version.file.url', record)
  const hash = toIntegrity(required(record.current_version?.file?.hash, 'current_version.file.hash', record))
  const addonId = required(record.guid, 'guid', record)

  const meta = buildMeta(record, defaultLocale)
  const output: OutputRecord = meta
    ? { pname, version, url, hash, addonId, meta }
    : { pname, version, url, hash, addonId }

  return Object.freeze(output)
}
