import type { pino } from 'pino';
import { rootLogger } from './logging/pino-setup.js';

/**
 * Logging abstraction used across assay packages.
 *
 * Callers that bring their own logging implement this interface; everything
 * else goes through {@link PinoLogger}.
 * @public
 */
export interface ILogger {
  /**
   * Log a debug message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  debug(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an info message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  info(message: string, context?: Record<string, unknown>): void;

  /**
   * Log a warning message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an error message.
   * @param message - The log message
   * @param error - Optional error object
   * @param context - Optional context object for structured logging
   */
  error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>,
  ): void;
}

/**
 * {@link ILogger} backed by a pino logger.
 * @public
 */
export class PinoLogger implements ILogger {
  public constructor(private readonly logger: pino.Logger) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  public error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>,
  ): void {
    const errorContext =
      error === undefined
        ? {}
        : { err: error instanceof Error ? error : new Error(String(error)) };
    this.logger.error({ ...context, ...errorContext }, message);
  }
}

/**
 * No-op logger implementation for testing or when logging is disabled.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Creates a logger whose lines carry `{ scope }`.
 * @param scope - The scope name, e.g. `asserts`
 * @param parent - Logger to derive from, {@link rootLogger} by default
 * @public
 */
export function createScopedLogger(
  scope: string,
  parent: pino.Logger = rootLogger,
): ILogger {
  return new PinoLogger(parent.child({ scope }));
}
