import { MissingLocaleValueError } from '../errors.js'
import type { LocalizedText } from './types.js'

/**
 * Pick the value for `defaultLocale` out of a localized field.
 *
 * A plain string is already resolved. A map without the default locale is a
 * malformed record; there is no fallback to other locales. A map that has the
 * key with a `null` translation resolves to `null`.
 */
export function resolveLocalized(field: string, value: LocalizedText, defaultLocale: string): string | null {
  if (typeof value === 'string') {
    return value
  }

  if (!Object.prototype.hasOwnProperty.call(value, defaultLocale)) {
    throw new MissingLocaleValueError(field, defaultLocale)
  }
  return value[defaultLocale] ?? null
}
