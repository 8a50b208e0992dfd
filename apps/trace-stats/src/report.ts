import type { TraceSummary } from '@trace-stats/pipeline-common'

const FIELD_WIDTH = 20

const REPORT_ROWS: ReadonlyArray<readonly [label: string, field: keyof TraceSummary]> = [
  ['Sample Size', 'sampleSize'],
  ['Min CPU', 'minCpu'],
  ['Max CPU', 'maxCpu'],
  ['Average CPU', 'averageCpu'],
  ['Min Duration', 'minDuration'],
  ['Max Duration', 'maxDuration'],
  ['Average Duration', 'averageDuration'],
  ['Average Reads', 'averageReads'],
  ['Average Writes', 'averageWrites'],
]

export const formatLine = (label: string, value: string): string => {
  return `${label.padStart(FIELD_WIDTH, ' ')}:${value.padStart(FIELD_WIDTH, ' ')}`
}

/** Renders the summary as nine fixed-width `label:value` lines. */
export const formatSummary = (summary: TraceSummary): string[] => {
  return REPORT_ROWS.map(([label, field]) => formatLine(label, String(summary[field])))
}

export const printSummary = (
  summary: TraceSummary,
  // eslint-disable-next-line no-console
  write: (line: string) => void = (line) => console.log(line)
): void => {
  for (const line of formatSummary(summary)) {
    write(line)
  }
}
