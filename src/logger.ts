/**
 * Logger for connection, re-dial and consumer lifecycle events.
 * Provides a simple, framework-agnostic interface for logging.
 */

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, err?: Error | Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
}

/**
 * Creates a logger that uses console for output.
 * Respects DEBUG environment variable for verbose output.
 *
 * @param scope - Component name shown in the line prefix
 * @returns Logger instance
 */
export const createLogger = (scope?: string): Logger => {
  const prefix = scope ? `[RabbitMQ:${scope}]` : '[RabbitMQ]';

  return {
    info: (msg: string, data?: Record<string, unknown>) => {
      console.log(`${prefix} ${msg}`, data ? JSON.stringify(data) : '');
    },
    warn: (msg: string, data?: Record<string, unknown>) => {
      console.warn(`${prefix} ${msg}`, data ? JSON.stringify(data) : '');
    },
    error: (msg: string, err?: Error | Record<string, unknown>) => {
      if (err instanceof Error) {
        console.error(`${prefix} ${msg}:`, err.message);
      } else {
        console.error(`${prefix} ${msg}`, err ? JSON.stringify(err) : '');
      }
    },
    debug: (msg: string, data?: Record<string, unknown>) => {
      if (process.env.DEBUG?.includes('rabbitmq')) {
        console.debug(`${prefix} ${msg}`, data ? JSON.stringify(data) : '');
      }
    },
  };
};

/**
 * Message of an unknown thrown value.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
