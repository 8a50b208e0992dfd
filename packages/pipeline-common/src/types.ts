/**
 * One recorded trace event, decoded from an element of the trace's `Events` container.
 * Columns absent from the element leave their field at the default.
 */
export interface TraceEvent {
  applicationName: string
  loginName: string
  textData: string
  duration: number
  cpu: number
  reads: number
  writes: number
}

/**
 * Descriptive statistics over the filtered event set.
 */
export interface TraceSummary {
  sampleSize: number
  minCpu: number
  maxCpu: number
  averageCpu: number
  minDuration: number
  maxDuration: number
  averageDuration: number
  averageReads: number
  averageWrites: number
}

/**
 * Predicates applied to the extracted events.
 */
export interface TraceFilters {
  /** Exact, case-sensitive `ApplicationName` an event must carry. */
  applicationName: string
  /** Case-sensitive substring the event's `TextData` must contain. */
  textContains: string
}

export const DEFAULT_TRACE_FILTERS: Readonly<TraceFilters> = Object.freeze({
  applicationName: 'Microsoft JDBC Driver for SQL Server',
  textContains: 'declare',
})

export const createTraceEvent = (overrides: Partial<TraceEvent> = {}): TraceEvent => ({
  applicationName: '',
  loginName: '',
  textData: '',
  duration: 0,
  cpu: 0,
  reads: 0,
  writes: 0,
  ...overrides,
})
