import { TraceStatsError, createTraceEvent } from '@trace-stats/pipeline-common'
import type { TraceEvent } from '@trace-stats/pipeline-common'
import { columnsOf } from './extract'
import { getAttribute, textContent } from './xml-document'
import type { XmlElement } from './xml-document'

type IntegerField = 'duration' | 'cpu' | 'reads' | 'writes'
type TextField = 'applicationName' | 'loginName' | 'textData'

const INTEGER_COLUMNS: ReadonlyMap<string, IntegerField> = new Map<string, IntegerField>([
  ['Duration', 'duration'],
  ['CPU', 'cpu'],
  ['Reads', 'reads'],
  ['Writes', 'writes'],
])

const TEXT_COLUMNS: ReadonlyMap<string, TextField> = new Map<string, TextField>([
  ['ApplicationName', 'applicationName'],
  ['LoginName', 'loginName'],
  ['TextData', 'textData'],
])

const INTEGER_PATTERN = /^[+-]?\d+$/

/**
 * Parses a column's text as an integer. Surrounding whitespace is allowed.
 * @throws TraceStatsError(`schema`) for anything else, including values outside the safe integer range.
 */
export const parseInteger = (value: string, column: string): number => {
  const trimmed = value.trim()
  const parsed = INTEGER_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN
  if (!Number.isSafeInteger(parsed)) {
    throw new TraceStatsError('schema', `Column "${column}" is not an integer: "${value}"`)
  }
  return parsed
}

/**
 * Decodes a relevant event element into a TraceEvent.
 * @param element Candidate that passed the relevance check.
 * @param namespace Namespace the `Column` children live in.
 * @throws TraceStatsError(`schema`) on a column without `name` or a non-integer numeric column.
 */
export const parseEvent = (element: XmlElement, namespace: string): TraceEvent => {
  const event = createTraceEvent()

  for (const column of columnsOf(element, namespace)) {
    const columnType = getAttribute(column, 'name')
    if (columnType === undefined) {
      throw new TraceStatsError(
        'schema',
        `<${column.qualifiedName}> in <${element.qualifiedName}> has no "name" attribute`
      )
    }

    const integerField = INTEGER_COLUMNS.get(columnType)
    if (integerField) {
      event[integerField] = parseInteger(textContent(column), columnType)
      continue
    }

    const textField = TEXT_COLUMNS.get(columnType)
    if (textField) {
      event[textField] = textContent(column)
    }
  }

  return Object.freeze(event)
}
