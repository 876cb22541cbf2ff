/**
 * Observability components for the upstream governor.
 *
 * Provides logging and metrics interfaces with pluggable implementations.
 */

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Log levels.
 */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

/**
 * Parses a level name such as `warn` or `DEBUG`.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.trim().toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): Logger;
}

/**
 * Line sink used by {@link ConsoleLogger}; defaults to the console.
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.ERROR:
      console.error(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

/**
 * JSON-lines logger with sensitive data redaction.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly redactKeys: Set<string>;
  private readonly sink: LogSink;

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    redactKeys?: string[];
    sink?: LogSink;
  } = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? {};
    this.redactKeys = new Set(
      (options.redactKeys ?? ['password', 'secret', 'token', 'apiKey', 'authorization', 'connectionString'])
        .map(k => k.toLowerCase())
    );
    this.sink = options.sink ?? consoleSink;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      redactKeys: Array.from(this.redactKeys),
      sink: this.sink,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const mergedContext = this.redact({ ...this.context, ...context });
    const output = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(mergedContext).length > 0 ? { context: mergedContext } : {}),
    };

    this.sink(level, JSON.stringify(output));
  }

  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (this.redactKeys.has(key.toLowerCase())) {
        result[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * No-op logger.
 */
export class NoopLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

/**
 * Log entry for in-memory logger.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

/**
 * In-memory logger for testing. Children share the parent's entry list.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, entries: LogEntry[] = []) {
    this.context = context;
    this.entries = entries;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addEntry(LogLevel.ERROR, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  private addEntry(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({
      level,
      message,
      context: { ...this.context, ...context },
      timestamp: new Date(),
    });
  }

  /** Gets all log entries */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /** Gets entries at a specific level */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(e => e.level === level);
  }

  /** Gets entries with an exact message */
  getEntriesWithMessage(message: string): LogEntry[] {
    return this.entries.filter(e => e.message === message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// Metrics Interface
// ============================================================================

/**
 * Metric names emitted by the governor.
 */
export const MetricNames = {
  ADMISSIONS_TOTAL: 'governor_admissions_total',
  RATE_LIMIT_REJECTIONS_TOTAL: 'governor_rate_limit_rejections_total',
  USAGE_ADJUSTMENT_UNITS: 'governor_usage_adjustment_units',
  CIRCUIT_REJECTIONS_TOTAL: 'governor_circuit_rejections_total',
  CIRCUIT_TRANSITIONS_TOTAL: 'governor_circuit_transitions_total',
  OPEN_CIRCUITS: 'governor_open_circuits',
  RETRIES_TOTAL: 'governor_retries_total',
  UPSTREAM_FAILURES_TOTAL: 'governor_upstream_failures_total',
  FALLBACKS_TOTAL: 'governor_fallbacks_total',
  REQUESTS_TOTAL: 'governor_requests_total',
  REQUEST_DURATION_MS: 'governor_request_duration_ms',
} as const;

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  increment(name: string, value?: number, tags?: Record<string, string>): void;
  gauge(name: string, value: number, tags?: Record<string, string>): void;
  histogram(name: string, value: number, tags?: Record<string, string>): void;
  timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}

/**
 * No-op metrics collector.
 */
export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  gauge(): void {}
  histogram(): void {}
  timing(): void {}
}

/**
 * Metric entry for in-memory collector.
 */
export interface MetricEntry {
  name: string;
  type: 'counter' | 'gauge' | 'histogram' | 'timing';
  value: number;
  tags?: Record<string, string>;
  timestamp: Date;
}

/**
 * In-memory metrics collector for testing.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly entries: MetricEntry[] = [];
  private readonly counters: Map<string, number> = new Map();
  private readonly gauges: Map<string, number> = new Map();

  increment(name: string, value: number = 1, tags?: Record<string, string>): void {
    const key = this.makeKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    this.entries.push({ name, type: 'counter', value, tags, timestamp: new Date() });
  }

  gauge(name: string, value: number, tags?: Record<string, string>): void {
    this.gauges.set(this.makeKey(name, tags), value);
    this.entries.push({ name, type: 'gauge', value, tags, timestamp: new Date() });
  }

  histogram(name: string, value: number, tags?: Record<string, string>): void {
    this.entries.push({ name, type: 'histogram', value, tags, timestamp: new Date() });
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    this.entries.push({ name, type: 'timing', value: durationMs, tags, timestamp: new Date() });
  }

  private makeKey(name: string, tags?: Record<string, string>): string {
    if (!tags || Object.keys(tags).length === 0) return name;
    const sortedTags = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}{${sortedTags}}`;
  }

  getEntries(): MetricEntry[] {
    return [...this.entries];
  }

  getCounter(name: string, tags?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, tags)) ?? 0;
  }

  getGauge(name: string, tags?: Record<string, string>): number | undefined {
    return this.gauges.get(this.makeKey(name, tags));
  }

  clear(): void {
    this.entries.length = 0;
    this.counters.clear();
    this.gauges.clear();
  }
}

// ============================================================================
// Observability Container
// ============================================================================

/**
 * Container for all observability components.
 */
export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
}

export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
  };
}

/**
 * Creates an in-memory observability container for testing.
 */
export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
  };
}

export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return {
    logger: new ConsoleLogger({ level, context: { component: 'upstream-governor' } }),
    metrics: new NoopMetricsCollector(),
  };
}
