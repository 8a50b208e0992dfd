import { TraceStatsError } from '@trace-stats/pipeline-common'

/**
 * Command-line configuration for a trace-stats run.
 */
export interface TraceStatsConfig {
  /** Path to the XML trace file. */
  inputFile: string
}

export type ParsedArgs = { kind: 'run'; config: TraceStatsConfig } | { kind: 'help' }

export const usage = `Usage: trace-stats <trace.xml>

Prints sample size and min/max/average CPU, duration, reads and writes for the
trace events recorded by the JDBC driver whose text contains "declare".

Options:
  -h, --help   Show this help message

Environment:
  TRACE_STATS_LOG_LEVEL   debug | info | warn | error | silent (default: warn)
`

/**
 * Parses CLI arguments (excluding node and script path).
 * @throws TraceStatsError(`argument`) when the input path is missing, repeated, or an option is unknown.
 */
export const parseArgs = (argv: string[]): ParsedArgs => {
  const positionals: string[] = []

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' }
    }

    if (arg.startsWith('-') && arg !== '-') {
      throw new TraceStatsError('argument', `Unknown argument: ${arg}`)
    }

    positionals.push(arg)
  }

  if (positionals.length === 0) {
    throw new TraceStatsError('argument', 'Missing input file argument')
  }
  if (positionals.length > 1) {
    throw new TraceStatsError('argument', `Expected one input file, got ${positionals.length}`)
  }

  return { kind: 'run', config: { inputFile: positionals[0] } }
}
