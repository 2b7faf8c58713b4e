import { describe, expect, it } from 'vitest'
import { parseFlags } from '../parse-flags.js'

describe('parseFlags', () => {
  it('reads space-separated and inline values', () => {
    expect(parseFlags(['--pages', '3', '--min-users=100'])).toEqual({ pages: '3', 'min-users': '100' })
  })

  it('treats a flag followed by another flag as a switch', () => {
    expect(parseFlags(['--verbose', '--parallel', '8'])).toEqual({ verbose: true, parallel: '8' })
  })

  it('treats a trailing flag as a switch', () => {
    expect(parseFlags(['--pages'])).toEqual({ pages: true })
  })

  it('keeps an empty inline value', () => {
    expect(parseFlags(['--output='])).toEqual({ output: '' })
  })

  it('ignores positional arguments', () => {
    expect(parseFlags(['fetch', '--pages', '2', 'extra'])).toEqual({ pages: '2' })
  })
})
