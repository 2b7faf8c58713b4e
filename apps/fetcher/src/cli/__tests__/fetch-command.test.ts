import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { ILogger, LogContext } from '@addons-feed/logger'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { jsonResponse, makeAddon, makeEnvelope, mockFetch } from '../../addons/__tests__/fixtures.js'
import type { OutputSink } from '../../kit/output.js'
import { runFetchCommand } from '../commands/fetch.js'

interface LogRecord {
  level: string
  message: string
  meta?: LogContext
}

function recordingLogger(records: LogRecord[]): ILogger {
  const log =
    (level: string) =>
    (message: string, meta?: LogContext): void => {
      records.push({ level, message, meta })
    }
  const logger: ILogger = {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    fatal: log('fatal'),
    child: () => logger,
  }
  return logger
}

function memorySink() {
  const writes: string[] = []
  const sink: OutputSink = {
    description: 'stdout',
    write: async (contents) => {
      writes.push(contents)
    },
  }
  return { sink, writes }
}

const env = { ADDONS_API_URL: 'https://api.example.test/search/' }

describe('runFetchCommand', () => {
  let records: LogRecord[]

  beforeEach(() => {
    records = []
  })

  it('prints the sorted artifact and exits 0', async () => {
    const fetchFn = mockFetch(() => jsonResponse(makeEnvelope([makeAddon('zeta'), makeAddon('alpha')])))
    const { sink, writes } = memorySink()

    const exitCode = await runFetchCommand({}, { logger: recordingLogger(records), env, fetchFn, stdout: sink })

    expect(exitCode).toBe(0)
    expect(writes).toHaveLength(1)
    const output = JSON.parse(writes[0]) as Array<{ pname: string }>
    expect(output.map((record) => record.pname)).toEqual(['alpha', 'zeta'])
    expect(records.some((record) => record.message === 'ADDONS_RUN_SUMMARY')).toBe(true)
  })

  it('exits 2 on an invalid invocation without fetching', async () => {
    const fetchFn = mockFetch(() => jsonResponse(makeEnvelope([])))
    const { sink, writes } = memorySink()

    const exitCode = await runFetchCommand(
      { 'page-size': '500' },
      { logger: recordingLogger(records), env, fetchFn, stdout: sink }
    )

    expect(exitCode).toBe(2)
    expect(fetchFn).not.toHaveBeenCalled()
    expect(writes).toEqual([])
    expect(records).toHaveLength(1)
    expect(records[0]).toMatchObject({
      level: 'fatal',
      message: 'Invalid invocation',
      meta: { error_code: 'CONFIGURATION_ERROR', error_category: 'validation' },
    })
  })

  it('exits 1 and writes nothing when a page fails', async () => {
    const fetchFn = mockFetch(() => new Response('oops', { status: 500, statusText: 'Internal Server Error' }))
    const { sink, writes } = memorySink()

    const exitCode = await runFetchCommand({}, { logger: recordingLogger(records), env, fetchFn, stdout: sink })

    expect(exitCode).toBe(1)
    expect(writes).toEqual([])
    const fatal = records.find((record) => record.level === 'fatal')
    expect(fatal).toMatchObject({
      message: 'Addons fetch failed; no output written',
      meta: {
        error_code: 'FETCH_FAILED',
        error_message: 'Page 1: HTTP 500: Internal Server Error',
      },
    })
  })

  it('exits 1 when a record is missing a required field', async () => {
    const broken = makeAddon('broken', { guid: null })
    const fetchFn = mockFetch(() => jsonResponse(makeEnvelope([makeAddon('fine'), broken])))
    const { sink, writes } = memorySink()

    const exitCode = await runFetchCommand({}, { logger: recordingLogger(records), env, fetchFn, stdout: sink })

    expect(exitCode).toBe(1)
    expect(writes).toEqual([])
    expect(records.find((record) => record.level === 'fatal')?.meta).toMatchObject({
      error_code: 'MISSING_REQUIRED_FIELD',
    })
  })

  describe('with --output', () => {
    let dir: string

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'addons-feed-cli-'))
    })

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    it('writes the artifact to the file instead of stdout', async () => {
      const path = join(dir, 'addons.json')
      const fetchFn = mockFetch(() => jsonResponse(makeEnvelope([makeAddon('only')])))
      const { sink, writes } = memorySink()

      const exitCode = await runFetchCommand(
        { output: path },
        { logger: recordingLogger(records), env, fetchFn, stdout: sink }
      )

      expect(exitCode).toBe(0)
      expect(writes).toEqual([])
      const output = JSON.parse(await readFile(path, 'utf8')) as Array<{ pname: string }>
      expect(output.map((record) => record.pname)).toEqual(['only'])
    })

    it('leaves no file behind when the run fails', async () => {
      const path = join(dir, 'addons.json')
      const fetchFn = mockFetch(() => jsonResponse({ unexpected: true }))

      const exitCode = await runFetchCommand({ output: path }, { logger: recordingLogger(records), env, fetchFn })

      expect(exitCode).toBe(1)
      expect(await readdir(dir)).toEqual([])
    })
  })
})
