import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const isLogLevel = (value: string): value is LogLevel => {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

function getLevelColor(level: Exclude<LogLevel, 'silent'>): (text: string) => string {
  switch (level) {
    case 'error':
      return pc.red
    case 'warn':
      return pc.yellow
    case 'info':
      return pc.cyan
    default:
      return pc.gray
  }
}

export interface Logger {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
}

export interface LoggerOptions {
  level?: LogLevel
  /** Line sink; defaults to console.error so stdout stays reserved for the report. */
  write?: (line: string) => void
}

/**
 * Reads the log level from `TRACE_STATS_LOG_LEVEL`, falling back to the default.
 */
export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel => {
  const value = env.TRACE_STATS_LOG_LEVEL?.trim().toLowerCase()
  if (value && isLogLevel(value)) {
    return value
  }
  return DEFAULT_LOG_LEVEL
}

/**
 * Creates a console logger that prefixes every line with `[scope]`.
 */
export const createLogger = (scope: string, options: LoggerOptions = {}): Logger => {
  const level = options.level ?? resolveLogLevel()
  // eslint-disable-next-line no-console
  const write = options.write ?? ((line: string) => console.error(line))

  const log = (lineLevel: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_ORDER[lineLevel] < LEVEL_ORDER[level]) {
      return
    }
    const color = getLevelColor(lineLevel)
    write(`${pc.blue(`[${scope}]`)} ${color(lineLevel)} ${message}`)
  }

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  }
}
