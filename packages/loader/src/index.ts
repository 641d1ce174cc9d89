export {
  createIntervalScheduler,
  IntervalScheduler,
  type IntervalSchedulerOptions,
} from "./adapters/interval/interval-scheduler"
export { createManualScheduler, ManualScheduler } from "./adapters/manual/manual-scheduler"
export { createMicrotaskScheduler, MicrotaskScheduler } from "./adapters/microtask/microtask-scheduler"
export { CoalescingBatchCache } from "./core/batch-cache"
export { createBatchLoader } from "./core/batch-loader"
export { LoaderError, type LoaderErrorCode } from "./core/errors/loader-error"
export { defaultCacheKey } from "./core/keys/cache-key"
export { compareOrderable } from "./core/keys/compare"
export { groupBy } from "./core/reconcile/group-by"
export { matchExact } from "./core/reconcile/match-exact"
export { matchOrdered } from "./core/reconcile/match-ordered"
export { createQuery, type QueryFn, ViewRegistry } from "./core/registry"
export { ExactView } from "./core/views/exact-view"
export { GroupView } from "./core/views/group-view"
export type { BatchCache, BatchCacheState, BatchCacheStats } from "./ports/batch-cache"
export type { BatchFetchFn, Reconciler } from "./ports/batch-fetch"
export type { BatchScheduler } from "./ports/batch-scheduler"
export type { CacheKeyFn, Key, KeyExtractor, Orderable, Scalar, SortExtractor } from "./ports/key"
export type {
  BatchCacheOptions,
  ExactViewSpec,
  GroupViewSpec,
  LoaderOptions,
  RegistryOptions,
} from "./ports/options"
export type {
  BoundQuery,
  Primeable,
  PrimeCommit,
  RegisteredView, View, ViewLoadFn, ViewMode } from "./ports/view"
