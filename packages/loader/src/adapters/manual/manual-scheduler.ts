import type { BatchScheduler } from "../../ports/batch-scheduler"

/**
 * Holds windows open until `flush()`. Useful in tests and in callers that
 * want to decide exactly when batches go out.
 */
export class ManualScheduler implements BatchScheduler {
  private queue: (() => Promise<void>)[] = []

  schedule(task: () => Promise<void>): void {
    this.queue.push(task)
  }

  /** Windows waiting for a flush. */
  get pending(): number {
    return this.queue.length
  }

  /**
   * Dispatches every waiting window and resolves once they have all settled,
   * including windows opened by loads made while flushing.
   */
  async flush(): Promise<void> {
    while (this.queue.length > 0) {
      const tasks = this.queue
      this.queue = []
      await Promise.all(tasks.map((task) => task()))
    }
  }
}

export function createManualScheduler(): ManualScheduler {
  return new ManualScheduler()
}
