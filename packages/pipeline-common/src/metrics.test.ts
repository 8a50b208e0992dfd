import { describe, expect, it } from 'vitest'
import { StageMetricsCollector } from './metrics'

const createClock = (ticks: number[]): (() => number) => {
  let index = 0
  return () => {
    const value = ticks[index] ?? ticks[ticks.length - 1] ?? 0
    index += 1
    return value
  }
}

describe('StageMetricsCollector', () => {
  it('records duration and array length per stage', () => {
    const collector = new StageMetricsCollector(createClock([0, 2, 2, 2.5]))

    const items = collector.recordStage('extract', () => ['a', 'b', 'c'])
    const total = collector.recordStage('aggregate', () => 42)

    expect(items).toEqual(['a', 'b', 'c'])
    expect(total).toBe(42)
    expect(collector.getMetrics()).toEqual([
      { stage: 'extract', durationMs: 2, itemCount: 3 },
      { stage: 'aggregate', durationMs: 0.5, itemCount: 1 },
    ])
    expect(collector.formatLines()).toEqual([
      'extract: 3 item(s) in 2.00ms',
      'aggregate: 1 item(s) in 0.50ms',
    ])
  })

  it('measures async stages', async () => {
    const collector = new StageMetricsCollector(createClock([10, 14]))

    const text = await collector.recordStageAsync('load', async () => 'xml')

    expect(text).toBe('xml')
    expect(collector.getMetrics()).toEqual([{ stage: 'load', durationMs: 4, itemCount: 1 }])
  })
})
