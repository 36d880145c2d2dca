/**
 * Structured Logging & Metrics
 *
 * JSON logging with context propagation for experiment builds.
 * Every log carries the session and segment being rebuilt.
 *
 * Features:
 * - JSON structured logs in production, readable lines in development
 * - Log levels: DEBUG, INFO, WARN, ERROR, FATAL
 * - Context propagation (sessionCode, segment, traceId)
 * - Build lifecycle logging
 * - Metric buffer for build counters
 * - Ring buffer for recent logs (in-memory access)
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "FATAL";

export interface LogContext {
  sessionCode?: string;
  segment?: string;
  traceId?: string;
}

export interface StructuredLogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Module that generated the log */
  service: string;
  message: string;
  /** Additional structured data */
  data?: Record<string, unknown>;
  error?: {
    message: string;
    code?: string;
    stack?: string;
  };
}

export type MetricUnit = "Count" | "Milliseconds" | "None";

export interface MetricEntry {
  name: string;
  value: number;
  unit: MetricUnit;
  dimensions: Record<string, string>;
  timestamp: string;
}

export interface BuildMetrics {
  traceId: string;
  durationMs: number;
  sessionsBuilt: number;
  sessionsFailed: number;
  observations: number;
  chatMessagesAttached: number;
  warnings: number;
}

export interface LoggerConfig {
  /** Minimum log level to output (default: INFO in production, DEBUG otherwise) */
  minLevel: LogLevel;
  /** Whether to output as JSON */
  jsonOutput: boolean;
  includeStackTraces: boolean;
  /** Maximum number of logs to keep in memory ring buffer */
  ringBufferSize: number;
}

export interface LoggerStats {
  totalLogs: number;
  logsByLevel: Record<LogLevel, number>;
  metricsEmitted: number;
  buildsCompleted: number;
  errorsLogged: number;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

const isProduction = process.env.NODE_ENV === "production";
const envLevel = process.env.LOG_LEVEL;

const config: LoggerConfig = {
  minLevel: isLogLevel(envLevel) ? envLevel : isProduction ? "INFO" : "DEBUG",
  jsonOutput: isProduction,
  includeStackTraces: !isProduction,
  ringBufferSize: 500,
};

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

const ringBuffer: StructuredLogEntry[] = [];
const metricBuffer: MetricEntry[] = [];
const MAX_METRIC_BUFFER = 200;

let stats: LoggerStats = emptyStats();

let currentContext: LogContext = {};

function emptyStats(): LoggerStats {
  return {
    totalLogs: 0,
    logsByLevel: { DEBUG: 0, INFO: 0, WARN: 0, ERROR: 0, FATAL: 0 },
    metricsEmitted: 0,
    buildsCompleted: 0,
    errorsLogged: 0,
  };
}

// ---------------------------------------------------------------------------
// Context Management
// ---------------------------------------------------------------------------

/**
 * Set the current logging context. All subsequent logs will include these fields.
 */
export function setContext(ctx: LogContext): void {
  currentContext = { ...currentContext, ...ctx };
}

export function clearContext(): void {
  currentContext = {};
}

/**
 * Run a function with a specific logging context.
 * The previous context is restored afterwards, including when fn throws.
 */
export function withContext<T>(ctx: LogContext, fn: () => T): T {
  const previousContext = { ...currentContext };
  setContext(ctx);
  try {
    return fn();
  } finally {
    currentContext = previousContext;
  }
}

// ---------------------------------------------------------------------------
// Core Logging
// ---------------------------------------------------------------------------

function log(
  level: LogLevel,
  service: string,
  message: string,
  data?: Record<string, unknown>,
  error?: Error,
): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[config.minLevel]) {
    return;
  }

  const entry: StructuredLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service,
    message,
    ...currentContext,
    data,
  };

  if (error) {
    entry.error = {
      message: error.message,
      code: "code" in error && typeof error.code === "string" ? error.code : undefined,
      stack: config.includeStackTraces ? error.stack : undefined,
    };
    stats.errorsLogged++;
  }

  stats.totalLogs++;
  stats.logsByLevel[level]++;

  ringBuffer.push(entry);
  if (ringBuffer.length > config.ringBufferSize) {
    ringBuffer.splice(0, ringBuffer.length - config.ringBufferSize);
  }

  let line: string;
  if (config.jsonOutput) {
    line = JSON.stringify(entry);
  } else {
    const prefix = `[${level}][${service}]`;
    const scope = [currentContext.sessionCode, currentContext.segment]
      .filter((part): part is string => part !== undefined)
      .join("/");
    const contextStr = scope ? ` (${scope})` : "";
    const dataStr = data ? ` ${JSON.stringify(data)}` : "";
    const errorStr = error ? ` ERROR: ${error.message}` : "";
    line = `${prefix}${contextStr} ${message}${dataStr}${errorStr}`;
  }

  if (level === "ERROR" || level === "FATAL") {
    console.error(line);
  } else if (level === "WARN") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

// ---------------------------------------------------------------------------
// Log Level Methods
// ---------------------------------------------------------------------------

export const logger = {
  debug(service: string, message: string, data?: Record<string, unknown>): void {
    log("DEBUG", service, message, data);
  },

  info(service: string, message: string, data?: Record<string, unknown>): void {
    log("INFO", service, message, data);
  },

  warn(service: string, message: string, data?: Record<string, unknown>): void {
    log("WARN", service, message, data);
  },

  error(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("ERROR", service, message, data, error);
  },

  fatal(service: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    log("FATAL", service, message, data, error);
  },
};

// ---------------------------------------------------------------------------
// Build Lifecycle Logging
// ---------------------------------------------------------------------------

/**
 * Log the start of a build and set its trace id as context.
 */
export function logBuildStart(traceId: string, source: string, rowCount: number): void {
  setContext({ traceId });
  logger.info("experiment-builder", "Experiment build started", {
    source,
    rowCount,
  });
}

/**
 * Log build completion and record its counters as metrics.
 */
export function logBuildComplete(metrics: BuildMetrics): void {
  logger.info("experiment-builder", "Experiment build completed", {
    durationMs: metrics.durationMs,
    sessionsBuilt: metrics.sessionsBuilt,
    sessionsFailed: metrics.sessionsFailed,
    observations: metrics.observations,
    chatMessagesAttached: metrics.chatMessagesAttached,
    warnings: metrics.warnings,
  });

  const dimensions = { traceId: metrics.traceId };
  emitMetric("BuildDuration", metrics.durationMs, "Milliseconds", dimensions);
  emitMetric("SessionsBuilt", metrics.sessionsBuilt, "Count", dimensions);
  emitMetric("SessionsFailed", metrics.sessionsFailed, "Count", dimensions);
  emitMetric("ObservationsBuilt", metrics.observations, "Count", dimensions);
  emitMetric("ChatMessagesAttached", metrics.chatMessagesAttached, "Count", dimensions);
  emitMetric("BuildWarnings", metrics.warnings, "Count", dimensions);

  stats.buildsCompleted++;
  clearContext();
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export function emitMetric(
  name: string,
  value: number,
  unit: MetricUnit,
  dimensions: Record<string, string>,
): void {
  stats.metricsEmitted++;

  metricBuffer.push({
    name,
    value,
    unit,
    dimensions,
    timestamp: new Date().toISOString(),
  });
  if (metricBuffer.length > MAX_METRIC_BUFFER) {
    metricBuffer.splice(0, metricBuffer.length - MAX_METRIC_BUFFER);
  }
}

// ---------------------------------------------------------------------------
// Log Access & Querying
// ---------------------------------------------------------------------------

/**
 * Get recent logs from the ring buffer.
 */
export function getRecentLogs(filters?: {
  level?: LogLevel;
  service?: string;
  sessionCode?: string;
  traceId?: string;
  limit?: number;
}): StructuredLogEntry[] {
  let filtered = [...ringBuffer];

  if (filters?.level) {
    const minPriority = LOG_LEVEL_PRIORITY[filters.level];
    filtered = filtered.filter((l) => LOG_LEVEL_PRIORITY[l.level] >= minPriority);
  }
  if (filters?.service) {
    filtered = filtered.filter((l) => l.service === filters.service);
  }
  if (filters?.sessionCode) {
    filtered = filtered.filter((l) => l.sessionCode === filters.sessionCode);
  }
  if (filters?.traceId) {
    filtered = filtered.filter((l) => l.traceId === filters.traceId);
  }

  const limit = filters?.limit ?? 50;
  return filtered.slice(-limit);
}

export function getRecentMetrics(limit = 50): MetricEntry[] {
  return metricBuffer.slice(-limit);
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function configureLogger(updates: Partial<LoggerConfig>): LoggerConfig {
  Object.assign(config, updates);
  return { ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...config };
}

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

export function getLoggerStats(): LoggerStats {
  return { ...stats, logsByLevel: { ...stats.logsByLevel } };
}

/**
 * Reset logger statistics and buffers.
 */
export function resetLoggerStats(): void {
  stats = emptyStats();
  ringBuffer.length = 0;
  metricBuffer.length = 0;
}
