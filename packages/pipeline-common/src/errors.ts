/**
 * Failure categories of a trace-stats run. None of them is recovered.
 */
export type TraceStatsErrorKind = 'argument' | 'io' | 'format' | 'schema' | 'empty-result'

export class TraceStatsError extends Error {
  public readonly kind: TraceStatsErrorKind

  public constructor(kind: TraceStatsErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TraceStatsError'
    this.kind = kind
  }
}

const FS_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'ENOTDIR', 'EMFILE', 'EIO'])

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null
}

const errorCode = (error: unknown): string | undefined => {
  if (!isRecord(error)) {
    return undefined
  }
  return typeof error.code === 'string' ? error.code : undefined
}

/**
 * Classifies a thrown value. File-system failures become `io` errors; a
 * TraceStatsError passes through; anything else is rethrown as is.
 */
export const toTraceStatsError = (error: unknown, context: string): TraceStatsError => {
  if (error instanceof TraceStatsError) {
    return error
  }

  const code = errorCode(error)
  if (code && FS_ERROR_CODES.has(code)) {
    const detail = error instanceof Error ? error.message : code
    return new TraceStatsError('io', `${context}: ${detail}`, { cause: error })
  }

  throw error
}

export const exitCodeFor = (kind: TraceStatsErrorKind): number => {
  return kind === 'argument' ? 2 : 1
}
