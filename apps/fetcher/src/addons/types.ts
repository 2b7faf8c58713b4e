/**
 * Search API envelope and add-on record shapes, plus the published feed record.
 *
 * A page only has to be a well-formed envelope whose results are objects. Field
 * types are checked per record by RecordMapper, after filtering, so an excluded
 * record never fails a run. Every field is optional and nullable: a missing
 * field is a RecordMapper decision.
 */

import { z } from 'zod'

/** Either a per-locale map or, when the API was asked for a single language, a plain string. */
export const localizedTextSchema = z.union([z.string(), z.record(z.string().nullable())])
export type LocalizedText = z.infer<typeof localizedTextSchema>

const permissionListSchema = z.array(z.string())

export const addonFileSchema = z
  .object({
    url: z.string().nullish(),
    hash: z.string().nullish(),
    status: z.string().nullish(),
    permissions: permissionListSchema.nullish(),
    host_permissions: permissionListSchema.nullish(),
    optional_permissions: permissionListSchema.nullish(),
  })
  .passthrough()

export const addonLicenseSchema = z
  .object({
    slug: z.string().nullish(),
  })
  .passthrough()

export const addonVersionSchema = z
  .object({
    version: z.string().nullish(),
    file: addonFileSchema.nullish(),
    license: addonLicenseSchema.nullish(),
  })
  .passthrough()

export const compatibilityRangeSchema = z
  .object({
    min: z.string().nullish(),
    max: z.string().nullish(),
  })
  .passthrough()
export type CompatibilityRange = z.infer<typeof compatibilityRangeSchema>

// v5 returns a flat list; v4 keyed the list by application.
export const addonCategoriesSchema = z.union([
  z.array(z.string()),
  z.record(z.array(z.string())),
])
export type AddonCategories = z.infer<typeof addonCategoriesSchema>

export const addonPromotionSchema = z
  .object({
    category: z.string().nullish(),
  })
  .passthrough()

export const addonRecordSchema = z
  .object({
    guid: z.string().nullish(),
    slug: localizedTextSchema.nullish(),
    status: z.string().nullish(),
    default_locale: z.string().nullish(),
    current_version: addonVersionSchema.nullish(),
    homepage: z
      .object({
        url: localizedTextSchema.nullish(),
      })
      .passthrough()
      .nullish(),
    summary: localizedTextSchema.nullish(),
    requires_payment: z.boolean().nullish(),
    compatibility: z
      .object({
        firefox: compatibilityRangeSchema.nullish(),
      })
      .passthrough()
      .nullish(),
    categories: addonCategoriesSchema.nullish(),
    tags: z.array(z.string()).nullish(),
    has_eula: z.boolean().nullish(),
    has_privacy_policy: z.boolean().nullish(),
    promoted: z.union([addonPromotionSchema, z.array(addonPromotionSchema)]).nullish(),
  })
  .passthrough()
export type AddonRecord = z.infer<typeof addonRecordSchema>

/** A search result as it arrives: any JSON object. */
export const rawAddonRecordSchema = z.record(z.unknown())
export type RawAddonRecord = z.infer<typeof rawAddonRecordSchema>

export const searchEnvelopeSchema = z.object({
  page_size: z.number().int().nonnegative().nullish(),
  page_count: z.number().int().nonnegative(),
  count: z.number().int().nonnegative(),
  next: z.string().nullish(),
  previous: z.string().nullish(),
  results: z.array(rawAddonRecordSchema),
})
export type RawSearchEnvelope = z.infer<typeof searchEnvelopeSchema>

/** One fetched page, reduced to what pagination and aggregation need. */
export interface SearchPage {
  page: number
  pageCount: number
  count: number
  records: RawAddonRecord[]
}

export interface AddonMeta {
  homepage?: string
  description?: string
  license?: string
  permissions?: string[]
  hostPermissions?: string[]
  optionalPermissions?: string[]
  requiresPayment?: boolean
  compatibility?: CompatibilityRange
  categories?: AddonCategories
  tags?: string[]
  hasEula?: boolean
  hasPrivacyPolicy?: boolean
  promotedCategory?: string
}

/** A published feed entry. Required fields are always set; meta is omitted when empty. */
export interface OutputRecord {
  readonly pname: string
  readonly version: string
  readonly url: string
  readonly hash: string
  readonly addonId: string
  readonly meta?: Readonly<AddonMeta>
}
