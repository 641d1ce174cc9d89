import type { BatchScheduler } from "../../ports/batch-scheduler"
import { LoaderError } from "../../core/errors/loader-error"

export type IntervalSchedulerOptions = {
  /** How long a window stays open after its first key. */
  delayMs: number
}

/** Keeps each window open for a fixed delay, trading latency for larger batches. */
export class IntervalScheduler implements BatchScheduler {
  readonly delayMs: number

  constructor(options: IntervalSchedulerOptions) {
    if (!Number.isFinite(options.delayMs) || options.delayMs < 0) {
      throw LoaderError.invalidOption("interval-scheduler", "delayMs", options.delayMs)
    }
    this.delayMs = options.delayMs
  }

  schedule(task: () => Promise<void>): void {
    setTimeout(() => {
      void task()
    }, this.delayMs)
  }
}

export function createIntervalScheduler(options: IntervalSchedulerOptions): BatchScheduler {
  return new IntervalScheduler(options)
}
