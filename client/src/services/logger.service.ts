/**
 * Logger Service
 *
 * Structured logging with Pino.
 * The menu pipeline never throws into host code, so anything worth knowing
 * about (unresolved anchors, failing actions) is reported here instead.
 *
 * Log Levels:
 * - error: An item action threw
 * - warn: Degraded presentation (anchor could not be mapped)
 * - info: Demo page actions
 * - debug: Layout and gesture tracing
 */

import pino from 'pino';
import { LogLevelSchema, type LogLevel } from './config.service';

// =============================================================================
// Configuration
// =============================================================================

function resolveLogLevel(): LogLevel {
  const fromEnv = LogLevelSchema.safeParse(import.meta.env.VITE_LOG_LEVEL);
  if (fromEnv.success) {
    return fromEnv.data;
  }
  return import.meta.env.DEV ? 'debug' : 'info';
}

// =============================================================================
// Logger Instance
// =============================================================================

export const logger = pino({
  level: resolveLogLevel(),
  browser: {
    asObject: true,
  },
  base: {
    app: 'press-menu',
  },
});

// =============================================================================
// Child Loggers for Services
// =============================================================================

/**
 * Create a child logger with service context
 */
export function createServiceLogger(service: string) {
  return logger.child({ service });
}

export const presentationLogger = createServiceLogger('presentation');
export const interactionLogger = createServiceLogger('interaction');
export const measureLogger = createServiceLogger('measure');
export const demoLogger = createServiceLogger('demo');

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Log an error with context
 */
export function logError(context: string, error: unknown, metadata?: Record<string, unknown>) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  logger.error({
    context,
    error: errorMessage,
    stack,
    ...metadata,
  }, `[${context}] ${errorMessage}`);
}

/**
 * Log a warning with context
 */
export function logWarn(context: string, message: string, metadata?: Record<string, unknown>) {
  logger.warn({
    context,
    ...metadata,
  }, `[${context}] ${message}`);
}

export default logger;
