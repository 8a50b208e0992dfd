import { TraceStatsError, createLogger, exitCodeFor, resolveLogLevel } from '@trace-stats/pipeline-common'
import { parseArgs, usage } from './config'
import { runTraceStats } from './pipeline'
import { printSummary } from './report'

/**
 * Output sinks and environment of one CLI invocation.
 */
export interface CliIo {
  stdout: (line: string) => void
  stderr: (line: string) => void
  env?: NodeJS.ProcessEnv
}

/**
 * Runs the CLI and returns the process exit code. Stdout receives the report
 * only once the whole run has succeeded; failures go to stderr.
 */
export const run = async (argv: string[], io: CliIo): Promise<number> => {
  const logger = createLogger('trace-stats', {
    level: resolveLogLevel(io.env ?? process.env),
    write: io.stderr,
  })

  try {
    const args = parseArgs(argv)
    if (args.kind === 'help') {
      io.stdout(usage)
      return 0
    }

    const { summary } = await runTraceStats(args.config.inputFile, { logger })
    printSummary(summary, io.stdout)
    return 0
  } catch (error) {
    if (error instanceof TraceStatsError) {
      io.stderr(`[trace-stats] error (${error.kind}): ${error.message}`)
      return exitCodeFor(error.kind)
    }
    const message = error instanceof Error ? error.message : String(error)
    io.stderr(`[trace-stats] failed: ${message}`)
    return 1
  }
}
