import { describe, expect, it } from 'vitest'
import { TraceStatsError, exitCodeFor, toTraceStatsError } from './errors'

const fsError = (code: string, message: string): Error => Object.assign(new Error(message), { code })

describe('toTraceStatsError', () => {
  it('passes TraceStatsError through unchanged', () => {
    const original = new TraceStatsError('schema', 'bad column')
    expect(toTraceStatsError(original, 'reading trace')).toBe(original)
  })

  it('classifies file-system failures as io errors', () => {
    const cause = fsError('ENOENT', "ENOENT: no such file or directory, open 'missing.xml'")
    const error = toTraceStatsError(cause, 'Cannot read trace file missing.xml')

    expect(error.kind).toBe('io')
    expect(error.message).toBe(
      "Cannot read trace file missing.xml: ENOENT: no such file or directory, open 'missing.xml'"
    )
    expect(error.cause).toBe(cause)
  })

  it('rethrows errors it cannot classify', () => {
    const unexpected = new RangeError('boom')
    expect(() => toTraceStatsError(unexpected, 'reading trace')).toThrow(unexpected)
  })
})

describe('exitCodeFor', () => {
  it('uses 2 for argument errors and 1 otherwise', () => {
    expect(exitCodeFor('argument')).toBe(2)
    expect(exitCodeFor('io')).toBe(1)
    expect(exitCodeFor('format')).toBe(1)
    expect(exitCodeFor('schema')).toBe(1)
    expect(exitCodeFor('empty-result')).toBe(1)
  })
})
