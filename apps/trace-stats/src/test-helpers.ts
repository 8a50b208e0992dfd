import { TraceStatsError } from '@trace-stats/pipeline-common'
import { childElements, parseTraceDocument } from './xml-document'
import type { XmlElement } from './xml-document'

export const TRACE_NAMESPACE = 'urn:test-trace'

/**
 * Runs `fn` and returns the TraceStatsError it throws; fails when it throws nothing or something else.
 */
export const catchTraceStatsError = async (fn: () => unknown): Promise<TraceStatsError> => {
  try {
    await fn()
  } catch (error) {
    if (error instanceof TraceStatsError) {
      return error
    }
    throw error
  }
  throw new Error('expected a TraceStatsError')
}

/**
 * Parses `<Root xmlns="urn:test-trace">{inner}</Root>` and returns the root's first child element.
 */
export const buildElement = (inner: string): XmlElement => {
  const document = parseTraceDocument(`<Root xmlns="${TRACE_NAMESPACE}">${inner}</Root>`)
  const [element] = childElements(document.root)
  if (!element) {
    throw new Error('fixture has no element')
  }
  return element
}

export const column = (name: string, value: string): string => `<Column name="${name}">${value}</Column>`
