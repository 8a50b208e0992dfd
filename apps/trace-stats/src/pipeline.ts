import {
  DEFAULT_TRACE_FILTERS,
  StageMetricsCollector,
  createLogger,
} from '@trace-stats/pipeline-common'
import type { Logger, StageMetrics, TraceFilters, TraceSummary } from '@trace-stats/pipeline-common'
import { buildSummary } from './aggregate'
import { extractCandidates, isRelevantEvent } from './extract'
import { parseEvent } from './parse'
import { applyPostFilter } from './rules'
import { loadTraceDocument } from './xml-document'

export interface TraceStatsOptions {
  filters?: Partial<TraceFilters>
  logger?: Logger
  metrics?: StageMetricsCollector
}

export interface TraceStatsResult {
  summary: TraceSummary
  counts: {
    candidates: number
    relevant: number
    filtered: number
  }
  stages: StageMetrics[]
}

/**
 * Runs load → extract → relevance → parse → post filter → aggregate over one trace file.
 * Every stage completes before the next starts; any failure aborts the run.
 */
export const runTraceStats = async (
  inputFile: string,
  options: TraceStatsOptions = {}
): Promise<TraceStatsResult> => {
  const filters: TraceFilters = { ...DEFAULT_TRACE_FILTERS, ...options.filters }
  const logger = options.logger ?? createLogger('trace-stats')
  const metrics = options.metrics ?? new StageMetricsCollector()

  logger.info(`Reading ${inputFile}`)
  const document = await metrics.recordStageAsync('load', () => loadTraceDocument(inputFile))
  const namespace = document.defaultNamespace

  const candidates = metrics.recordStage('extract', () => extractCandidates(document))
  const relevant = metrics.recordStage('relevance', () =>
    candidates.filter((element) => isRelevantEvent(element, namespace, filters.applicationName))
  )
  const events = metrics.recordStage('parse', () =>
    relevant.map((element) => parseEvent(element, namespace))
  )
  const filtered = metrics.recordStage('post-filter', () =>
    applyPostFilter(events, filters.textContains)
  )

  logger.debug(
    `candidates=${candidates.length} relevant=${relevant.length} filtered=${filtered.length}`
  )

  const summary = metrics.recordStage('aggregate', () => buildSummary(filtered))

  for (const line of metrics.formatLines()) {
    logger.debug(line)
  }

  return {
    summary,
    counts: {
      candidates: candidates.length,
      relevant: relevant.length,
      filtered: filtered.length,
    },
    stages: metrics.getMetrics(),
  }
}
