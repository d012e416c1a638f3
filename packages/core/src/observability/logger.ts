/**
 * Structured logging for the lifecycle, dispatch and store engines.
 *
 * Each engine logs through a logger bound to what it is: a registry carries
 * its owner, a holder its name, a store its name. Those fields travel with
 * every entry. Nothing is written until a sink is configured.
 *
 * @module observability/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly level: LogLevel;
  readonly module: string;
  readonly message: string;
  readonly timestamp: number;
  /** Bound fields merged with the call's own; absent when both are empty */
  readonly context?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface TetherLoggerConfig {
  /** Module label, e.g. `app:checkout` (default: 'tether') */
  readonly module?: string;
  /** Entries below this level are dropped (default: 'info') */
  readonly level?: LogLevel;
  /** Receives every entry that passes the level; without one the logger is silent */
  readonly sink?: LogSink;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Sink writing one JSON line per entry to the console */
export const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') {
    console.error(line);
  } else if (entry.level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

/**
 * @example
 * ```typescript
 * const log = createLogger({ module: 'checkout', level: 'debug', sink: consoleSink });
 * const registry = new LifecycleRegistry(screen, { logger: log.child('lifecycle') });
 * const cart = new MutableDataHolder<Cart>({ name: 'cart', logger: log });
 * ```
 */
export class TetherLogger {
  readonly module: string;
  private readonly level: LogLevel;
  private readonly sink: LogSink | undefined;
  private readonly fields: Readonly<Record<string, unknown>>;

  constructor(config: TetherLoggerConfig = {}, fields: Record<string, unknown> = {}) {
    this.module = config.module ?? 'tether';
    this.level = config.level ?? 'info';
    this.sink = config.sink;
    this.fields = fields;
  }

  /** Logger for `module:subModule` that keeps this logger's fields */
  child(subModule: string): TetherLogger {
    return new TetherLogger(
      { module: `${this.module}:${subModule}`, level: this.level, sink: this.sink },
      this.fields
    );
  }

  /** Logger for the same module that adds `fields` to every entry */
  with(fields: Record<string, unknown>): TetherLogger {
    return new TetherLogger(
      { module: this.module, level: this.level, sink: this.sink },
      { ...this.fields, ...fields }
    );
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(
      'error',
      message,
      error ? { ...context, error: { name: error.name, message: error.message } } : context
    );
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const sink = this.sink;
    if (!sink || SEVERITY[level] < SEVERITY[this.level]) {
      return;
    }
    const merged = { ...this.fields, ...context };
    sink({
      level,
      module: this.module,
      message,
      timestamp: Date.now(),
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    });
  }
}

export function createLogger(config?: TetherLoggerConfig): TetherLogger {
  return new TetherLogger(config);
}

const rootLogger = new TetherLogger({ module: 'tether' });

/** Silent logger for an engine that was not handed one */
export function defaultLogger(subModule: string): TetherLogger {
  return rootLogger.child(subModule);
}
