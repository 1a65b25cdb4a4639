/**
 * Structured logging utilities
 *
 * Lines go to the console (picked up by cron mail or the Functions host) and
 * are mirrored to Application Insights and Sentry when those are configured.
 */

import { trackTrace, trackException, SeverityLevel } from './telemetry';
import { captureException, captureMessage, addBreadcrumb } from './sentry';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Minimum level that reaches the console, read from LOG_LEVEL on every call
 * so tests and long-lived hosts can change it at runtime
 */
function minimumLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL ?? '').toUpperCase();
  return Object.values(LogLevel).find((level) => level === configured) ?? LogLevel.INFO;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

/**
 * Formats a log message with timestamp and context
 */
export function formatLogMessage(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` | ${JSON.stringify(context)}` : '';
  return `[${timestamp}] [${level}] ${message}${contextStr}`;
}

/**
 * Convert LogContext to string properties for Application Insights
 */
function contextToProperties(context?: LogContext): Record<string, string> | undefined {
  if (!context) return undefined;

  const properties: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    properties[key] = typeof value === 'object' ? JSON.stringify(value) : String(value);
  }
  return properties;
}

/**
 * Log debug message
 */
export function debug(message: string, context?: LogContext): void {
  if (!isEnabled(LogLevel.DEBUG)) return;
  console.debug(formatLogMessage(LogLevel.DEBUG, message, context));
  trackTrace(message, SeverityLevel.Verbose, contextToProperties(context));
  addBreadcrumb(message, 'debug', 'debug', context);
}

/**
 * Log informational message
 */
export function info(message: string, context?: LogContext): void {
  if (!isEnabled(LogLevel.INFO)) return;
  console.info(formatLogMessage(LogLevel.INFO, message, context));
  trackTrace(message, SeverityLevel.Information, contextToProperties(context));
  addBreadcrumb(message, 'info', 'info', context);
}

/**
 * Log warning message
 */
export function warn(message: string, context?: LogContext): void {
  if (!isEnabled(LogLevel.WARN)) return;
  console.warn(formatLogMessage(LogLevel.WARN, message, context));
  trackTrace(message, SeverityLevel.Warning, contextToProperties(context));
  captureMessage(message, 'warning', context);
}

/**
 * Log error message; errors are never filtered out by LOG_LEVEL
 */
export function error(message: string, context?: LogContext): void {
  console.error(formatLogMessage(LogLevel.ERROR, message, context));
  trackTrace(message, SeverityLevel.Error, contextToProperties(context));
  captureMessage(message, 'error', context);
}

/**
 * Log error with full error object details, including the stack
 */
export function logError(message: string, err: Error, context?: LogContext): void {
  const errorContext = {
    ...context,
    errorName: err.name,
    errorMessage: err.message,
    errorStack: err.stack,
  };
  error(message, errorContext);

  trackException(err, contextToProperties(context));
  captureException(err, context);
}
