import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a child logger that inherits the parent context and adds
   * (or overrides, shallowly) the given fields on every entry it emits.
   *
   * Loaders use this to scope their entries, e.g. `child({ loader: "pages.byId" })`.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
