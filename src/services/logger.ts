/**
 * Structured logging for the Control Coverage Engine
 *
 * Every line is a JSON object carrying a correlation id so a single
 * assessment run can be traced across collaborator calls.
 */

import { CoverageEngineError } from '../types/error-handling.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

/**
 * Log entry structure for structured logging
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  correlationId: string;
  timestamp: string;
  assessmentId?: string;
  controlId?: string;
  action?: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
  metadata?: Record<string, unknown>;
}

export type LogContext = Partial<Omit<LogEntry, 'level' | 'message' | 'correlationId' | 'timestamp'>>;

export function createLogEntry(
  level: LogLevel,
  message: string,
  correlationId: string,
  context?: LogContext
): LogEntry {
  return {
    level,
    message,
    correlationId,
    timestamp: new Date().toISOString(),
    ...context,
  };
}

/**
 * Writes entries to the console, one JSON line each
 */
export class Logger {
  constructor(
    private readonly correlationId: string,
    private readonly minLevel: LogLevel = 'INFO'
  ) {}

  /**
   * Logger sharing this one's level under a different correlation id
   */
  child(correlationId: string): Logger {
    return new Logger(correlationId, this.minLevel);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  debug(message: string, context?: LogContext): void {
    if (!this.isEnabled('DEBUG')) return;
    console.debug(JSON.stringify(createLogEntry('DEBUG', message, this.correlationId, context)));
  }

  info(message: string, context?: LogContext): void {
    if (!this.isEnabled('INFO')) return;
    console.log(JSON.stringify(createLogEntry('INFO', message, this.correlationId, context)));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.isEnabled('WARN')) return;
    console.warn(JSON.stringify(createLogEntry('WARN', message, this.correlationId, context)));
  }

  error(error: Error, context?: Omit<LogContext, 'error'>): void {
    if (!this.isEnabled('ERROR')) return;
    const entry = createLogEntry('ERROR', error.message, this.correlationId, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: error instanceof CoverageEngineError ? error.errorCode : undefined,
      },
    });
    console.error(JSON.stringify(entry));
  }
}
