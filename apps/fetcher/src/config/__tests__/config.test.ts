import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../errors.js'
import { DEFAULT_ENDPOINT, loadFetchConfig } from '../index.js'

describe('loadFetchConfig', () => {
  it('applies defaults when nothing is given', () => {
    expect(loadFetchConfig({}, {})).toEqual({
      endpoint: DEFAULT_ENDPOINT,
      lang: 'en-US',
      app: 'firefox',
      type: 'extension',
      sort: 'users',
      pageSize: 50,
      concurrency: 4,
      timeoutMs: 30000,
      verbose: false,
    })
  })

  it('reads CLI flags', () => {
    const config = loadFetchConfig(
      {
        pages: '3',
        'min-users': '100',
        parallel: '8',
        'page-size': '25',
        'timeout-ms': '5000',
        endpoint: 'https://api.example.test/search/',
        output: 'addons.json',
        verbose: true,
      },
      {}
    )
    expect(config).toMatchObject({
      pageLimit: 3,
      minUsers: 100,
      concurrency: 8,
      pageSize: 25,
      timeoutMs: 5000,
      endpoint: 'https://api.example.test/search/',
      output: 'addons.json',
      verbose: true,
    })
  })

  it('falls back to environment variables and lets flags win', () => {
    const env = {
      ADDONS_API_URL: 'https://env.example.test/search/',
      ADDONS_PAGE_SIZE: '10',
      ADDONS_CONCURRENCY: '2',
      ADDONS_MIN_USERS: '',
      ADDONS_LANG: 'de',
    }
    const config = loadFetchConfig({ 'page-size': '20' }, env)

    expect(config.endpoint).toBe('https://env.example.test/search/')
    expect(config.pageSize).toBe(20)
    expect(config.concurrency).toBe(2)
    expect(config.lang).toBe('de')
    expect(config.minUsers).toBeUndefined()
  })

  it('accepts a zero user threshold', () => {
    expect(loadFetchConfig({ 'min-users': '0' }, {}).minUsers).toBe(0)
  })

  it('rejects out-of-range numbers', () => {
    expect(() => loadFetchConfig({ 'page-size': '80' }, {})).toThrow(ConfigurationError)
    expect(() => loadFetchConfig({ 'page-size': '80' }, {})).toThrow(
      /^Invalid configuration: --page-size \/ ADDONS_PAGE_SIZE: /
    )
    expect(() => loadFetchConfig({ pages: '0' }, {})).toThrow(/--pages: /)
    expect(() => loadFetchConfig({ parallel: '1.5' }, {})).toThrow(/--parallel \/ ADDONS_CONCURRENCY: /)
  })

  it('rejects values that are not numbers', () => {
    expect(() => loadFetchConfig({ pages: 'all' }, {})).toThrow(ConfigurationError)
  })

  it('rejects value flags given without a value', () => {
    expect(() => loadFetchConfig({ pages: true }, {})).toThrow('--pages requires a value')
  })

  it('rejects a value on a switch', () => {
    expect(() => loadFetchConfig({ verbose: 'yes' }, {})).toThrow('--verbose does not take a value')
  })

  it('rejects unknown flags', () => {
    expect(() => loadFetchConfig({ page: '2', 'min-user': '5' }, {})).toThrow(
      'Unknown option(s): --min-user, --page'
    )
  })

  it('rejects an invalid endpoint', () => {
    expect(() => loadFetchConfig({ endpoint: 'not a url' }, {})).toThrow(/--endpoint \/ ADDONS_API_URL: /)
  })
})
