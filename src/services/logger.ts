import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { randomUUID } from 'crypto';

// ============================================================================
// TypeScript Interfaces
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** Service name (e.g., "engine", "match-probe", "adb-device") */
  service: string;

  /** Event type/name */
  event: string;

  /** Severity level */
  severity: LogLevel;

  /** ISO timestamp */
  timestamp: string;

  /** Run/operation correlation ID */
  trace_id?: string;

  /** Additional context-specific fields */
  [key: string]: unknown;
}

export interface LogEntry extends LogContext {
  /** Human-readable log message */
  message: string;

  /** Performance timing data (ms) */
  duration?: number;

  /** Error details if applicable */
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };

  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** Overall logging level */
  level: LogLevel;

  /** Output format */
  format: LogFormat;

  /** Whether to include trace IDs */
  includeTrace: boolean;

  /** Append-only log file; no file output when unset */
  filePath?: string;

  /** Echo entries to the console */
  console: boolean;

  /** Service-specific log levels */
  serviceLevels?: Record<string, LogLevel>;
}

export interface PerformanceTimer {
  /** Start timestamp */
  startTime: number;

  /** Operation description */
  operation: string;

  /** Trace ID */
  traceId?: string;

  /** Additional context */
  context?: Record<string, unknown>;

  /** End the timer and log duration */
  end(additionalContext?: Record<string, unknown>): number;
}

// ============================================================================
// Environment Configuration
// ============================================================================

export const isLogLevel = (value: unknown): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

export const isLogFormat = (value: unknown): value is LogFormat => value === 'json' || value === 'text';

export const parseServiceLevels = (env?: string): Record<string, LogLevel> => {
  if (!env) return {};

  const levels: Record<string, LogLevel> = {};
  env.split(',').forEach(pair => {
    const [service, level] = pair.trim().split('=');
    const normalized = level?.trim().toLowerCase();
    if (service && isLogLevel(normalized)) {
      levels[service.trim()] = normalized;
    }
  });
  return levels;
};

const getConfig = (): LoggerConfig => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  const format = process.env.LOG_FORMAT?.toLowerCase();

  return {
    level: isLogLevel(level) ? level : 'info',
    format: isLogFormat(format) ? format : 'text',
    includeTrace: process.env.LOG_INCLUDE_TRACE !== 'false',
    filePath: process.env.LOG_FILE ? resolve(process.env.LOG_FILE) : undefined,
    console: process.env.LOG_CONSOLE !== 'false',
    serviceLevels: parseServiceLevels(process.env.SERVICE_LOG_LEVELS)
  };
};

const errorCode = (error: Error): string | number | undefined => {
  if ('code' in error) {
    const code = error.code;
    if (typeof code === 'string' || typeof code === 'number') {
      return code;
    }
  }
  return undefined;
};

// ============================================================================
// Logger Implementation
// ============================================================================

class StructuredLogger {
  private config: LoggerConfig;

  constructor(overrides: Partial<LoggerConfig> = {}) {
    this.config = { ...getConfig(), ...overrides };
  }

  /**
   * Generate a new trace ID
   */
  generateTraceId(): string {
    return randomUUID().replace(/-/g, '').substring(0, 16);
  }

  /**
   * Create a performance timer for measuring operation duration
   */
  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    const startTime = Date.now();

    return {
      startTime,
      operation,
      traceId,
      context,
      end: (additionalContext?: Record<string, unknown>) => {
        const duration = Date.now() - startTime;

        this.logEntry({
          service: 'performance-monitor',
          event: 'operation_duration',
          severity: 'debug',
          timestamp: new Date().toISOString(),
          trace_id: traceId,
          operation,
          duration,
          message: `Operation ${operation} completed in ${duration}ms`,
          ...context,
          ...additionalContext
        });

        return duration;
      }
    };
  }

  /**
   * Check if a log level should be filtered out
   */
  private shouldLog(service: string, severity: LogLevel): boolean {
    const configLevel = this.config.serviceLevels?.[service] || this.config.level;
    return LOG_LEVELS.indexOf(severity) >= LOG_LEVELS.indexOf(configLevel);
  }

  /**
   * Format log entry based on configuration
   */
  format(entry: LogEntry): string {
    if (this.config.format === 'text') {
      const parts = [
        `[${entry.timestamp}]`,
        `[${entry.severity.toUpperCase()}]`,
        entry.service,
        entry.event,
        entry.message
      ];

      if (entry.trace_id && this.config.includeTrace) {
        parts.push(`[trace:${entry.trace_id}]`);
      }

      if (entry.duration) {
        parts.push(`(${entry.duration}ms)`);
      }

      let formatted = parts.join(' ');

      if (entry.error) {
        formatted += ` Error: ${entry.error.name}: ${entry.error.message}`;
      }

      if (entry.metadata && Object.keys(entry.metadata).length > 0) {
        formatted += ` ${JSON.stringify(entry.metadata)}`;
      }

      return formatted;
    }

    // JSON format
    const jsonEntry = { ...entry };

    if (!this.config.includeTrace && jsonEntry.trace_id) {
      delete jsonEntry.trace_id;
    }

    return JSON.stringify(jsonEntry);
  }

  /**
   * Write log entry to file and console
   */
  private write(formattedEntry: string, severity: LogLevel): void {
    if (this.config.filePath) {
      try {
        const dir = dirname(this.config.filePath);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
        appendFileSync(this.config.filePath, formattedEntry + '\n');
      } catch (error) {
        console.error('Failed to write to log file:', error);
      }
    }

    if (!this.config.console) {
      return;
    }

    if (severity === 'error') {
      console.error(formattedEntry);
    } else if (severity === 'warn') {
      console.warn(formattedEntry);
    } else {
      console.log(formattedEntry);
    }
  }

  /**
   * Internal log method
   */
  logEntry(entry: LogEntry): void {
    if (!this.shouldLog(entry.service, entry.severity)) {
      return;
    }

    this.write(this.format(entry), entry.severity);
  }

  /**
   * Log a message with structured context
   */
  log(context: LogContext, message: string, metadata?: Record<string, unknown>): void {
    this.logEntry({
      ...context,
      message,
      timestamp: context.timestamp || new Date().toISOString(),
      metadata
    });
  }

  debug(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('debug', service, event, message, traceId, metadata);
  }

  info(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('info', service, event, message, traceId, metadata);
  }

  warn(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('warn', service, event, message, traceId, metadata);
  }

  error(service: string, event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logEntry({
      service,
      event,
      severity: 'error',
      timestamp: new Date().toISOString(),
      trace_id: this.config.includeTrace ? traceId : undefined,
      message,
      metadata,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCode(error)
      } : undefined
    });
  }

  private emit(
    severity: Exclude<LogLevel, 'error'>,
    service: string,
    event: string,
    message: string,
    traceId?: string,
    metadata?: Record<string, unknown>
  ): void {
    this.logEntry({
      service,
      event,
      severity,
      timestamp: new Date().toISOString(),
      trace_id: this.config.includeTrace ? traceId : undefined,
      message,
      metadata
    });
  }

  /**
   * Get current configuration
   */
  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  /**
   * Update configuration
   */
  updateConfig(updates: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...updates };
  }
}

// ============================================================================
// Service-Specific Logger Factory
// ============================================================================

class ServiceLogger {
  constructor(
    private logger: StructuredLogger,
    private serviceName: string
  ) {}

  get service(): string {
    return this.serviceName;
  }

  /**
   * Derive a logger for a sub-component, e.g. "state.start_menu"
   */
  child(name: string): ServiceLogger {
    return new ServiceLogger(this.logger, `${this.serviceName}.${name}`);
  }

  generateTraceId(): string {
    return this.logger.generateTraceId();
  }

  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    return this.logger.startTimer(`${this.serviceName}:${operation}`, traceId, context);
  }

  debug(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.debug(this.serviceName, event, message, traceId, metadata);
  }

  info(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.info(this.serviceName, event, message, traceId, metadata);
  }

  warn(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.warn(this.serviceName, event, message, traceId, metadata);
  }

  error(event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.error(this.serviceName, event, message, error, traceId, metadata);
  }
}

// ============================================================================
// Export Instances
// ============================================================================

// Process-wide default; components receive ServiceLoggers through their constructors
const structuredLogger = new StructuredLogger();

export const createServiceLogger = (serviceName: string, base: StructuredLogger = structuredLogger): ServiceLogger => {
  return new ServiceLogger(base, serviceName);
};

export const logger = structuredLogger;

export { StructuredLogger, ServiceLogger };
