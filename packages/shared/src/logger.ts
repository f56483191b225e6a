/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation and document IDs from AsyncLocalStorage context
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    documentId: reqContext?.documentId,
    sourceFilename: reqContext?.sourceFilename,
    layoutVersion: reqContext?.layoutVersion,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function serializeError(error: unknown): unknown {
  if (!(error instanceof Error)) return String(error);

  // Lohnjournal errors carry page/row/field context
  const toJSON: unknown = Reflect.get(error, 'toJSON');
  if (typeof toJSON === 'function') {
    return { ...toJSON.call(error), stack: error.stack };
  }

  return {
    message: error.message,
    stack: error.stack,
    name: error.name,
  };
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    const errorContext = {
      ...context,
      error: serializeError(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (process.env.LOG_LEVEL === 'debug') {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
