import { z } from 'zod'
import type { RawAddonRecord } from './types.js'

export const PUBLIC_STATUS = 'public'

const publicAddonSchema = z.object({
  status: z.literal(PUBLIC_STATUS),
  current_version: z.object({
    file: z.object({
      status: z.literal(PUBLIC_STATUS),
    }),
  }),
})

/**
 * A record is published in the feed only when both the add-on and its current file are public.
 * Nothing else about the record is inspected here.
 */
export function isEligibleAddon(record: RawAddonRecord): boolean {
  return publicAddonSchema.safeParse(record).success
}
