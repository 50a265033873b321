import { STATIC_MAX_LEVEL, resolveFilterLevel, type Env } from './config';
import { ContextChain, type ContextGroup } from './context';
import { filterLevel, fuse, ignoreErrors, type Drain } from './drain';
import { FilterLevel, isLevelEnabled, Level } from './level';
import { kv, LogRecord, UNKNOWN_CALL_SITE, type CallData, type CallSite, type Message } from './record';

/**
 * Hierarchical structured logger.
 * A logger is a drain plus a context chain; children share the drain and add one context group.
 */
export class Logger {
  private constructor(
    readonly drain: Drain<never>,
    readonly context: ContextChain,
  ) {}

  /**
   * Build the top-level logger.
   * The drain must not be able to fail; wrap fallible drains with `ignoreErrors()` or `fuse()` first.
   */
  static root(drain: Drain<never>, group: ContextGroup = []): Logger {
    return new Logger(drain, ContextChain.root(group));
  }

  /**
   * Create a child logger with additional context
   */
  child(group: ContextGroup): Logger {
    return new Logger(this.drain, ContextChain.child(group, this.context));
  }

  /**
   * Dispatch a built record to the drain tree.
   * The outcome is dropped: logging is fire-and-forget for the caller.
   */
  log(record: LogRecord): void {
    this.drain.log(record, this.context);
  }

  /**
   * Static ceiling check. Call before doing any work to prepare a record.
   */
  isEnabled(level: Level): boolean {
    return isLevelEnabled(level, STATIC_MAX_LEVEL);
  }

  /**
   * Log at `level`. Nothing is built or evaluated when the level is above the static ceiling.
   */
  logAt(level: Level, msg: Message, data?: CallData, site: CallSite = UNKNOWN_CALL_SITE): void {
    if (!this.isEnabled(level)) return;
    this.log(new LogRecord(level, msg, kv(data), site));
  }

  /**
   * Log a critical message
   */
  critical(msg: Message, data?: CallData, site?: CallSite): void {
    this.logAt(Level.Critical, msg, data, site);
  }

  /**
   * Log an error message
   */
  error(msg: Message, data?: CallData, site?: CallSite): void {
    this.logAt(Level.Error, msg, data, site);
  }

  /**
   * Log a warning message
   */
  warning(msg: Message, data?: CallData, site?: CallSite): void {
    this.logAt(Level.Warning, msg, data, site);
  }

  /**
   * Log an info message
   */
  info(msg: Message, data?: CallData, site?: CallSite): void {
    this.logAt(Level.Info, msg, data, site);
  }

  /**
   * Log a debug message
   */
  debug(msg: Message, data?: CallData, site?: CallSite): void {
    this.logAt(Level.Debug, msg, data, site);
  }

  /**
   * Log a trace message
   */
  trace(msg: Message, data?: CallData, site?: CallSite): void {
    this.logAt(Level.Trace, msg, data, site);
  }
}

/* --------------------------------- Factory --------------------------------- */

export type CreateLoggerOptions<E> = {
  /** Where records go. May be fallible; see `onError`. */
  drain: Drain<E>;
  /**
   * Runtime threshold. If omitted, resolves from env:
   * `DEBUG_MODE` → `LOG_LEVEL` → `NODE_ENV` (see `resolveFilterLevel`).
   */
  level?: FilterLevel;
  /** Level when `NODE_ENV=production` and no explicit level / env override. Default: Error. */
  prodDefault?: FilterLevel;
  /** Environment bag; defaults to `process.env` when available. */
  env?: Env;
  /**
   * What to do when the drain fails:
   * - 'ignore' (default): drop the failure
   * - 'fuse': throw `DrainFusedError` from the logging call
   */
  onError?: 'ignore' | 'fuse';
  /** Context attached to the root logger. */
  context?: ContextGroup;
};

/**
 * Create a root logger over `drain`, filtered at the resolved runtime level,
 * with the chosen error strategy applied at the top.
 */
export function createLogger<E>(options: CreateLoggerOptions<E>): Logger {
  const threshold = resolveFilterLevel({ level: options.level, env: options.env, prodDefault: options.prodDefault });
  const filtered = filterLevel(threshold, options.drain);
  const root = options.onError === 'fuse' ? fuse(filtered) : ignoreErrors(filtered);
  return Logger.root(root, options.context);
}
