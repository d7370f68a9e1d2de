/**
 * Logging and metrics capabilities for the JSON store.
 *
 * Both are passed to the store's constructor as an `Observability` bundle;
 * nothing here is a module-level singleton.
 */

// ============================================================================
// Logger
// ============================================================================

/**
 * Log levels.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Log entry captured by `InMemoryLogger`.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context: Record<string, unknown>;
}

/**
 * Structured logger.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Writes one JSON object per line to the console.
 * Keys listed in `redactKeys` are replaced with `[REDACTED]` at any depth.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly redactKeys: Set<string>;

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    redactKeys?: string[];
  } = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? {};
    this.redactKeys = new Set(
      (options.redactKeys ?? ['uri', 'connectionUri', 'password', 'secret']).map((key) => key.toLowerCase())
    );
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

  /**
   * Formats a log line without writing it.
   */
  format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const merged = this.redact({ ...this.context, ...context });
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const line = this.format(level, message, context);
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
  }

  private redact(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (this.redactKeys.has(key.toLowerCase())) {
        result[key] = '[REDACTED]';
      } else if (isRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Discards everything.
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

/**
 * Keeps log entries in memory for assertions.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.add(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.add(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.add(LogLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.add(LogLevel.ERROR, message, context);
  }

  private add(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level, message, timestamp: new Date(), context: { ...context } });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Metric names emitted by the store.
 */
export const MetricNames = {
  OPERATIONS_TOTAL: 'docstore_operations_total',
  OPERATION_LATENCY: 'docstore_operation_latency_ms',
  ERRORS_TOTAL: 'docstore_errors_total',
  DOCUMENTS_READ: 'docstore_documents_read_total',
  DOCUMENTS_WRITTEN: 'docstore_documents_written_total',
  DOCUMENTS_DELETED: 'docstore_documents_deleted_total',
  CONNECTIONS_ACTIVE: 'docstore_connections_active',
  CONNECTION_ERRORS: 'docstore_connection_errors_total',
} as const;

export type MetricName = (typeof MetricNames)[keyof typeof MetricNames];

/**
 * Metric entry captured by `InMemoryMetricsCollector`.
 */
export interface MetricEntry {
  name: string;
  value: number;
  timestamp: Date;
  labels?: Record<string, string>;
}

/**
 * Metrics sink.
 */
export interface MetricsCollector {
  /**
   * Increment a counter.
   * @param value - Amount to add (default: 1)
   */
  increment(name: string, value?: number, labels?: Record<string, string>): void;

  /**
   * Set a gauge value.
   */
  gauge(name: string, value: number, labels?: Record<string, string>): void;

  /**
   * Record a duration in milliseconds.
   */
  timing(name: string, durationMs: number, labels?: Record<string, string>): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  gauge(): void {}
  timing(): void {}
}

/**
 * Aggregates counters and gauges in memory, keyed by name and sorted labels.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly entries: MetricEntry[] = [];
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    this.entries.push({ name, value, labels, timestamp: new Date() });
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    this.gauges.set(this.makeKey(name, labels), value);
    this.entries.push({ name, value, labels, timestamp: new Date() });
  }

  timing(name: string, durationMs: number, labels?: Record<string, string>): void {
    this.entries.push({ name, value: durationMs, labels, timestamp: new Date() });
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) return name;
    const sorted = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}{${sorted}}`;
  }

  getMetrics(): MetricEntry[] {
    return [...this.entries];
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  getGauge(name: string, labels?: Record<string, string>): number | undefined {
    return this.gauges.get(this.makeKey(name, labels));
  }

  clear(): void {
    this.entries.length = 0;
    this.counters.clear();
    this.gauges.clear();
  }
}

// ============================================================================
// Capability Bundle
// ============================================================================

/**
 * Capabilities injected into the client and the store.
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
 * Console logging at the given level, metrics discarded.
 */
export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return {
    logger: new ConsoleLogger({ level }),
    metrics: new NoopMetricsCollector(),
  };
}
