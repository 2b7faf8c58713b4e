import { type ILogger, setLogLevel } from '@addons-feed/logger'
import { runAddonsFetch } from '../../addons/run.js'
import { type FetchConfig, loadFetchConfig } from '../../config/index.js'
import { EXIT_CODES, classifyError, formatErrorForLog } from '../../errors.js'
import type { FetchFn } from '../../kit/http.js'
import { type OutputSink, fileSink, streamSink } from '../../kit/output.js'

export interface FetchCommandDeps {
  logger: ILogger
  env?: NodeJS.ProcessEnv
  fetchFn?: FetchFn
  /** Sink used when --output is not given; defaults to process.stdout */
  stdout?: OutputSink
}

function reportFailure(logger: ILogger, message: string, error: unknown): number {
  const classified = classifyError(error)
  logger.fatal(message, formatErrorForLog(classified), error)
  return classified.exitCode
}

/**
 * Run the pipeline for parsed CLI flags and return the process exit code.
 * Diagnostics go to the logger; the artifact goes to stdout or --output.
 */
export async function runFetchCommand(
  flags: Record<string, string | boolean>,
  deps: FetchCommandDeps
): Promise<number> {
  let config: FetchConfig
  try {
    config = loadFetchConfig(flags, deps.env ?? process.env)
  } catch (error) {
    return reportFailure(deps.logger, 'Invalid invocation', error)
  }

  if (config.verbose) {
    setLogLevel('debug')
  }

  const sink = config.output ? fileSink(config.output) : deps.stdout ?? streamSink(process.stdout)

  try {
    await runAddonsFetch(config, {
      sink,
      logger: deps.logger,
      fetchFn: deps.fetchFn,
    })
    return EXIT_CODES.SUCCESS
  } catch (error) {
    return reportFailure(deps.logger, 'Addons fetch failed; no output written', error)
  }
}
