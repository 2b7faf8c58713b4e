import { vi } from 'vitest'
import type { AddonRecord, RawAddonRecord, RawSearchEnvelope } from '../types.js'

export const DIGEST_HEX = '000102030405060708090a0b0c0d0e0f101112131415161718191a1b1c1d1e1f'
export const DIGEST_SRI = 'sha256-AAECAwQFBgcICQoLDA0ODxAREhMUFRYXGBkaGxwdHh8='

/** A public add-on with only the required fields set. */
export function makeAddon(slug: string, overrides: Partial<AddonRecord> = {}): AddonRecord {
  return {
    guid: `${slug}@example.test`,
    slug,
    status: 'public',
    default_locale: 'en-US',
    current_version: {
      version: '1.0.0',
      file: {
        url: `https://files.example.test/${slug}-1.0.0.xpi`,
        hash: `sha256:${DIGEST_HEX}`,
        status: 'public',
      },
    },
    ...overrides,
  }
}

export function makeEnvelope(
  results: RawAddonRecord[],
  init: { pageCount?: number; count?: number; pageSize?: number } = {}
): RawSearchEnvelope {
  return {
    page_size: init.pageSize ?? 50,
    page_count: init.pageCount ?? 1,
    count: init.count ?? results.length,
    next: null,
    previous: null,
    results,
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

/** Page number requested by a search URL. */
export function pageOf(url: string): number {
  return Number(new URL(url).searchParams.get('page'))
}

export type FetchCall = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

/** A fetch stand-in that hands the requested URL to `handler`. */
export function mockFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  return vi.fn<FetchCall>(async (input, init) => handler(String(input), init))
}

/** A fetch stand-in that never answers and rejects once its signal aborts. */
export function hangingFetch() {
  return vi.fn<FetchCall>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')), {
          once: true,
        })
      })
  )
}
