/**
 * Decides when a collecting window closes and dispatches.
 *
 * `schedule` is called once per window, when its first key arrives. The task
 * settles once the window's callers are settled and never rejects.
 */
export interface BatchScheduler {
  schedule(task: () => Promise<void>): void
}
