// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Structured logging utility with correlation ID support
 * Provides consistent logging format and error tracking
 */

import { randomUUID } from 'crypto';

// Log levels, lowest first
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

const LEVEL_ORDER: LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.FATAL
];

// Interface for structured log entries
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  orderId?: string;
  context?: string;
  data?: unknown;
  error?: unknown;
}

export interface LogOptions {
  correlationId?: string;
  orderId?: string | number;
  context?: string;
  data?: unknown;
  error?: unknown;
}

let minimumLevel: LogLevel = LogLevel.INFO;

/**
 * Set the lowest level that will be written
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

/**
 * Create a new correlation ID for tracking a multi-step operation
 */
export function createCorrelationId(): string {
  return `corr-${randomUUID()}`;
}

/**
 * Format an error object for logging
 */
function formatError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      cause: error.cause !== undefined ? formatError(error.cause) : undefined
    };
  }

  return error;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(minimumLevel);
}

function createLogEntry(level: LogLevel, message: string, options?: LogOptions): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    correlationId: options?.correlationId,
    orderId: options?.orderId !== undefined ? String(options.orderId) : undefined,
    context: options?.context,
    data: options?.data,
    error: options?.error !== undefined ? formatError(options.error) : undefined
  };
}

/**
 * Output a log entry to the console method matching its level
 */
function outputLogEntry(entry: LogEntry): void {
  const logString = `[${entry.timestamp}] ${entry.level}: ${JSON.stringify(entry)}`;

  switch (entry.level) {
    case LogLevel.DEBUG:
      console.debug(logString);
      break;
    case LogLevel.INFO:
      console.info(logString);
      break;
    case LogLevel.WARN:
      console.warn(logString);
      break;
    case LogLevel.ERROR:
    case LogLevel.FATAL:
      console.error(logString);
      break;
  }
}

function write(level: LogLevel, message: string, options?: LogOptions): void {
  if (!isEnabled(level)) return;
  outputLogEntry(createLogEntry(level, message, options));
}

export function debug(message: string, options?: LogOptions): void {
  write(LogLevel.DEBUG, message, options);
}

export function info(message: string, options?: LogOptions): void {
  write(LogLevel.INFO, message, options);
}

export function warn(message: string, options?: LogOptions): void {
  write(LogLevel.WARN, message, options);
}

export function error(message: string, options?: LogOptions): void {
  write(LogLevel.ERROR, message, options);
}

export function fatal(message: string, options?: LogOptions): void {
  write(LogLevel.FATAL, message, options);
}

// Default export for convenience
export default {
  setLogLevel,
  getLogLevel,
  createCorrelationId,
  debug,
  info,
  warn,
  error,
  fatal
};
