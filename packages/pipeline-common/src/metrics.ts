/**
 * Timing and item count recorded for one pipeline stage.
 */
export interface StageMetrics {
  stage: string
  durationMs: number
  /** Items the stage produced. */
  itemCount: number
}

export class StageMetricsCollector {
  private readonly stages: StageMetrics[] = []

  constructor(private readonly now: () => number = () => performance.now()) {}

  /**
   * Measure a synchronous stage. Arrays returned by the stage are counted.
   */
  recordStage<T>(stage: string, fn: () => T): T {
    const start = this.now()
    const result = fn()
    this.push(stage, start, result)
    return result
  }

  /**
   * Measure an async stage
   */
  async recordStageAsync<T>(stage: string, fn: () => Promise<T>): Promise<T> {
    const start = this.now()
    const result = await fn()
    this.push(stage, start, result)
    return result
  }

  getMetrics(): StageMetrics[] {
    return this.stages.map((entry) => ({ ...entry }))
  }

  /**
   * Render one line per stage, e.g. `extract: 3 item(s) in 0.42ms`.
   */
  formatLines(): string[] {
    return this.stages.map(
      (entry) => `${entry.stage}: ${entry.itemCount} item(s) in ${entry.durationMs.toFixed(2)}ms`
    )
  }

  private push(stage: string, start: number, result: unknown): void {
    this.stages.push({
      stage,
      durationMs: this.now() - start,
      itemCount: Array.isArray(result) ? result.length : 1,
    })
  }
}
