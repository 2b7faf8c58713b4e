import { describe, expect, it } from 'vitest'
import { safeJsonParse } from '../json.js'

describe('safeJsonParse', () => {
  it('returns the parsed value', () => {
    expect(safeJsonParse('{"page_count":2}')).toEqual({ ok: true, value: { page_count: 2 } })
  })

  it('returns the parser message instead of throwing', () => {
    const result = safeJsonParse('<html>')
    expect(result.ok).toBe(false)
    expect(result.ok ? '' : result.error).toMatch(/JSON/)
  })
})
