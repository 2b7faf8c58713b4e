/**
 * Presence-checked values for optional source fields.
 *
 * `null` from the API and a missing key both become `absent`; a present value is
 * carried as-is, including empty strings and empty lists.
 */

export type Presence<T> = { present: true; value: T } | { present: false }

export const absent: Presence<never> = { present: false }

export function present<T>(value: T): Presence<T> {
  return { present: true, value }
}

export function fromNullable<T>(value: T | null | undefined): Presence<T> {
  return value === null || value === undefined ? absent : present(value)
}
