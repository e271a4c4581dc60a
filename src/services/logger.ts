/**
 * Logger - structured logging for loki-mcp
 * Writes JSON lines to stderr and, when attached to a shipper, feeds every
 * record into the Loki pipeline
 */

import type { LogShipper } from './log-shipper.js';
import type { FieldValue } from './log-record.js';
import { LOG_LEVEL_PRIORITY, LogLevel } from '../types.js';

export type { LogLevel } from '../types.js';

export type LogMetadata = Record<string, unknown>;

export interface LoggerConfig {
  logLevel: LogLevel;
  component: string;
  enableConsole: boolean;
  shipper?: LogShipper;
}

export class Logger {
  private config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  /**
   * Log a debug message
   */
  debug(action: string, message: string, metadata?: LogMetadata): void {
    this.log('DEBUG', action, message, metadata);
  }

  /**
   * Log an info message
   */
  info(action: string, message: string, metadata?: LogMetadata): void {
    this.log('INFO', action, message, metadata);
  }

  /**
   * Log a warning message
   */
  warn(action: string, message: string, metadata?: LogMetadata): void {
    this.log('WARN', action, message, metadata);
  }

  /**
   * Log an error message
   */
  error(action: string, message: string, metadata?: LogMetadata): void {
    this.log('ERROR', action, message, metadata);
  }

  /**
   * Log a fatal error message
   */
  fatal(action: string, message: string, metadata?: LogMetadata): void {
    this.log('FATAL', action, message, metadata);
  }

  /**
   * A logger for another component sharing this logger's level and sinks
   */
  child(component: string): Logger {
    return new Logger({ ...this.config, component });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.logLevel];
  }

  private log(level: LogLevel, action: string, message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = new Date();

    if (this.config.enableConsole) {
      const logEntry = {
        timestamp: timestamp.toISOString(),
        component: this.config.component,
        level,
        action,
        message,
        ...(metadata && { metadata: consoleMetadata(metadata) })
      };
      console.error(`[-${this.config.component.toUpperCase()}] ${serialize(logEntry)}`);
    }

    if (this.config.shipper) {
      this.config.shipper.emit({
        timestamp,
        message,
        level,
        logger: this.config.component,
        fields: { action, ...flattenMetadata(metadata) }
      });
    }
  }

  /**
   * Log outbound HTTP request start
   */
  logRequestStart(method: string, url: string, metadata?: LogMetadata): void {
    this.debug('HTTP_REQUEST_START', `${method} ${url}`, {
      method,
      url,
      ...metadata
    });
  }

  /**
   * Log outbound HTTP request completion
   */
  logRequestSuccess(method: string, url: string, status: number, duration: number, metadata?: LogMetadata): void {
    this.debug('HTTP_REQUEST_COMPLETE', `${method} ${url} - ${status} (${duration}ms)`, {
      method,
      url,
      status,
      duration_ms: duration,
      ...metadata
    });
  }

  /**
   * Log outbound HTTP request error
   */
  logRequestError(method: string, url: string, error: unknown, duration: number, metadata?: LogMetadata): void {
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.debug('HTTP_REQUEST_ERROR', `${method} ${url} - ${errorMessage}`, {
      method,
      url,
      error: errorMessage,
      duration_ms: duration,
      ...metadata
    });
  }

  /**
   * Log tool execution start
   */
  logToolStart(toolName: string, params: unknown): void {
    this.info(toolName, `Executing ${toolName}`, {
      toolParams: params,
      paramCount: params && typeof params === 'object' ? Object.keys(params).length : 0
    });
  }

  /**
   * Log tool execution success
   */
  logToolSuccess(toolName: string, duration: number, responseData?: unknown): void {
    this.info(toolName, `${toolName} completed successfully`, {
      duration_ms: duration,
      responseData: truncateIfNeeded(responseData),
      responseSize: responseData === undefined ? 0 : serialize(responseData).length
    });
  }

  /**
   * Log tool execution error
   */
  logToolError(toolName: string, error: unknown, duration: number, params?: unknown): void {
    this.error(toolName, `${toolName} failed`, {
      duration_ms: duration,
      errorDetails: {
        message: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined
      },
      toolParams: params,
      errorType: error instanceof Error ? error.constructor.name : typeof error
    });
  }

  getStatus(): { component: string; logLevel: LogLevel; enableConsole: boolean; shipping: boolean } {
    return {
      component: this.config.component,
      logLevel: this.config.logLevel,
      enableConsole: this.config.enableConsole,
      shipping: this.config.shipper !== undefined
    };
  }
}

function flattenMetadata(metadata?: LogMetadata): Record<string, FieldValue> {
  const fields: Record<string, FieldValue> = {};
  if (!metadata) return fields;

  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined || value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      fields[key] = value;
    } else if (typeof value === 'bigint') {
      fields[key] = value.toString();
    } else {
      fields[key] = serialize(value);
    }
  }
  return fields;
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * JSON for a log line; values JSON cannot hold (circular, functions) fall back to String()
 */
function serialize(value: unknown): string {
  try {
    return JSON.stringify(value, bigintReplacer) ?? String(value);
  } catch {
    return String(value);
  }
}

function consoleMetadata(metadata: LogMetadata): LogMetadata {
  const cleaned: LogMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (typeof value === 'bigint' || typeof value === 'function') {
      cleaned[key] = String(value);
    } else if (value !== null && typeof value === 'object') {
      try {
        JSON.stringify(value, bigintReplacer);
        cleaned[key] = value;
      } catch {
        cleaned[key] = String(value);
      }
    } else {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Truncate large data objects to prevent oversized log entries
 */
function truncateIfNeeded(data: unknown, maxSize: number = 10000): unknown {
  if (data === undefined || data === null) return data;

  const jsonString = serialize(data);
  if (jsonString.length <= maxSize) return data;

  return {
    _truncated: true,
    _originalSize: jsonString.length,
    _data: `[TRUNCATED - Original size: ${jsonString.length} chars]`
  };
}
