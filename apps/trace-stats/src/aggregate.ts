import { TraceStatsError } from '@trace-stats/pipeline-common'
import type { TraceEvent, TraceSummary } from '@trace-stats/pipeline-common'

interface AggregateStats {
  count: number
  minCpu: number
  maxCpu: number
  minDuration: number
  maxDuration: number
  cpuSum: number
  durationSum: number
  readsSum: number
  writesSum: number
}

/**
 * Computes min/max/average statistics over the filtered events in one pass.
 * @returns Frozen summary.
 * @throws TraceStatsError(`empty-result`) when no event passed the filters.
 */
export const buildSummary = (events: readonly TraceEvent[]): TraceSummary => {
  if (events.length === 0) {
    throw new TraceStatsError(
      'empty-result',
      'No events matched the filters; min, max and average are undefined for an empty set'
    )
  }

  const stats: AggregateStats = {
    count: 0,
    minCpu: Number.POSITIVE_INFINITY,
    maxCpu: Number.NEGATIVE_INFINITY,
    minDuration: Number.POSITIVE_INFINITY,
    maxDuration: Number.NEGATIVE_INFINITY,
    cpuSum: 0,
    durationSum: 0,
    readsSum: 0,
    writesSum: 0,
  }

  for (const event of events) {
    stats.count += 1
    stats.minCpu = Math.min(stats.minCpu, event.cpu)
    stats.maxCpu = Math.max(stats.maxCpu, event.cpu)
    stats.minDuration = Math.min(stats.minDuration, event.duration)
    stats.maxDuration = Math.max(stats.maxDuration, event.duration)
    stats.cpuSum += event.cpu
    stats.durationSum += event.duration
    stats.readsSum += event.reads
    stats.writesSum += event.writes
  }

  return Object.freeze({
    sampleSize: stats.count,
    minCpu: stats.minCpu,
    maxCpu: stats.maxCpu,
    averageCpu: stats.cpuSum / stats.count,
    minDuration: stats.minDuration,
    maxDuration: stats.maxDuration,
    averageDuration: stats.durationSum / stats.count,
    averageReads: stats.readsSum / stats.count,
    averageWrites: stats.writesSum / stats.count,
  })
}
