/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with a timer helper for long operations
 */

import pino from 'pino';

export type { Logger } from 'pino';

const LEVEL_ALIASES: Record<string, string> = {
  warning: 'warn',
  critical: 'fatal',
};

/**
 * Lower-case a level name and map the `WARNING`/`CRITICAL` spellings onto
 * pino's; blank means unset
 */
export function normalizeLogLevel(level: string | undefined): string | undefined {
  const trimmed = level?.trim().toLowerCase();
  if (!trimmed) {
    return undefined;
  }
  return LEVEL_ALIASES[trimmed] ?? trimmed;
}

/**
 * Create a Pino logger with defaults for the chat assistant
 */
export function createLogger(
  options: pino.LoggerOptions = {},
  destination?: pino.DestinationStream,
): pino.Logger {
  // JSON-RPC output owns stdout in MCP mode
  const isMCPMode = process.env.MCP_MODE === 'true';
  const transport =
    destination ??
    (isMCPMode
      ? pino.transport({
          target: 'pino/file',
          options: { destination: 2 },
        })
      : undefined);

  return pino(
    {
      name: 'cd-chat-assistant',
      level:
        normalizeLogLevel(process.env.LOG_LEVEL) ??
        (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
      ...options,
    },
    transport,
  );
}

export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;
      logger.info(
        { operation, duration_ms: duration, ...context, ...additionalContext },
        `Completed ${operation} in ${duration}ms`,
      );
      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;
      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
      return duration;
    },
  };
}
