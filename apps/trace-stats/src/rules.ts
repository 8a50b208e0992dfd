import type { TraceEvent } from '@trace-stats/pipeline-common'

/**
 * Keeps an event whose text contains `textContains` and that used CPU.
 */
export const passesPostFilter = (event: TraceEvent, textContains: string): boolean => {
  return event.textData.includes(textContains) && event.cpu > 0
}

export const applyPostFilter = (events: readonly TraceEvent[], textContains: string): TraceEvent[] => {
  return events.filter((event) => passesPostFilter(event, textContains))
}
