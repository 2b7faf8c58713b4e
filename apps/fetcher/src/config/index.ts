/**
 * Invocation options for a fetch run.
 *
 * Precedence: CLI flag, then environment variable, then default. Everything is
 * validated once here; the pipeline trusts the resulting FetchConfig.
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors.js'

export const DEFAULT_ENDPOINT = 'https://addons.mozilla.org/api/v5/addons/search/'
export const MAX_PAGE_SIZE = 50
export const MAX_CONCURRENCY = 32

export const fetchConfigSchema = z.object({
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  lang: z.string().min(1).default('en-US'),
  app: z.string().min(1).default('firefox'),
  type: z.string().min(1).default('extension'),
  sort: z.string().min(1).default('users'),
  pageLimit: z.coerce.number().int().min(1).optional(),
  minUsers: z.coerce.number().int().min(0).optional(),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
  concurrency: z.coerce.number().int().min(1).max(MAX_CONCURRENCY).default(4),
  timeoutMs: z.coerce.number().int().min(1).default(30000),
  verbose: z.boolean().default(false),
  output: z.string().min(1).optional(),
})

export type FetchConfig = z.infer<typeof fetchConfigSchema>
type ConfigKey = keyof FetchConfig

interface OptionSource {
  flag?: string
  env?: string
}

const OPTION_SOURCES: Record<ConfigKey, OptionSource> = {
  endpoint: { flag: 'endpoint', env: 'ADDONS_API_URL' },
  lang: { env: 'ADDONS_LANG' },
  app: { env: 'ADDONS_APP' },
  type: { env: 'ADDONS_TYPE' },
  sort: { env: 'ADDONS_SORT' },
  pageLimit: { flag: 'pages' },
  minUsers: { flag: 'min-users', env: 'ADDONS_MIN_USERS' },
  pageSize: { flag: 'page-size', env: 'ADDONS_PAGE_SIZE' },
  concurrency: { flag: 'parallel', env: 'ADDONS_CONCURRENCY' },
  timeoutMs: { flag: 'timeout-ms', env: 'ADDONS_TIMEOUT_MS' },
  verbose: { flag: 'verbose' },
  output: { flag: 'output' },
}

const BOOLEAN_OPTIONS = new Set<ConfigKey>(['verbose'])

export const KNOWN_FLAGS: ReadonlySet<string> = new Set(
  Object.values(OPTION_SOURCES).flatMap((source) => (source.flag ? [source.flag] : []))
)

function isConfigKey(value: PropertyKey): value is ConfigKey {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(OPTION_SOURCES, value)
}

function describeOption(key: PropertyKey): string {
  if (!isConfigKey(key)) {
    return String(key)
  }
  const source = OPTION_SOURCES[key]
  const names = [source.flag && `--${source.flag}`, source.env].filter(Boolean)
  return names.join(' / ')
}

function readOption(
  key: ConfigKey,
  flags: Record<string, string | boolean>,
  env: NodeJS.ProcessEnv
): string | boolean | undefined {
  const source = OPTION_SOURCES[key]
  const flagValue = source.flag ? flags[source.flag] : undefined

  if (BOOLEAN_OPTIONS.has(key)) {
    if (flagValue !== undefined && flagValue !== true) {
      throw new ConfigurationError(`--${source.flag} does not take a value`, { option: key })
    }
    return flagValue
  }

  if (flagValue === true) {
    throw new ConfigurationError(`--${source.flag} requires a value`, { option: key })
  }
  if (flagValue !== undefined) {
    return flagValue
  }

  const envValue = source.env ? env[source.env] : undefined
  return envValue === undefined || envValue === '' ? undefined : envValue
}

/**
 * Build a validated FetchConfig from parsed CLI flags and the environment.
 * Throws ConfigurationError for unknown flags and invalid values.
 */
export function loadFetchConfig(
  flags: Record<string, string | boolean>,
  env: NodeJS.ProcessEnv = process.env
): FetchConfig {
  const unknownFlags = Object.keys(flags)
    .filter((flag) => !KNOWN_FLAGS.has(flag))
    .sort()
  if (unknownFlags.length > 0) {
    throw new ConfigurationError(`Unknown option(s): ${unknownFlags.map((flag) => `--${flag}`).join(', ')}`, {
      unknownFlags,
    })
  }

  const raw: Partial<Record<ConfigKey, string | boolean>> = {}
  for (const key of Object.keys(OPTION_SOURCES)) {
    if (!isConfigKey(key)) continue
    const value = readOption(key, flags, env)
    if (value !== undefined) {
      raw[key] = value
    }
  }

  const parsed = fetchConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${describeOption(issue.path[0] ?? '')}: ${issue.message}`
    )
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { problems })
  }

  return parsed.data
}
