import type { BatchScheduler } from "../../ports/batch-scheduler"

/**
 * Dispatches after the current promise-job queue drains and before I/O: a
 * resolved-promise hop, then `process.nextTick`. Every load issued in the
 * same turn, including from already-resolved continuations, shares a window.
 */
export class MicrotaskScheduler implements BatchScheduler {
  schedule(task: () => Promise<void>): void {
    void Promise.resolve().then(() => {
      process.nextTick(() => {
        void task()
      })
    })
  }
}

export function createMicrotaskScheduler(): BatchScheduler {
  return new MicrotaskScheduler()
}
