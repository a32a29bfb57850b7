/**
 * Pino logger setup shared by every assay package.
 */

import { pino } from 'pino';

/**
 * Options for {@link createRootLogger}.
 * @public
 */
export interface RootLoggerOptions {
  /** Minimum level written; `silent` disables output. */
  level?: pino.LevelWithSilent;
  /** Where log lines go; defaults to stdout. */
  destination?: pino.DestinationStream;
}

const LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Reads the log level from `ASSAY_LOG_LEVEL`, falling back to `silent`.
 * @internal
 */
export function levelFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): pino.LevelWithSilent {
  const requested = (env.ASSAY_LOG_LEVEL ?? '').toLowerCase();
  return LEVELS.find((level) => level === requested) ?? 'silent';
}

/**
 * Creates a pino logger with the standard serializers.
 * @param options - Level and destination overrides
 * @public
 */
export function createRootLogger(options: RootLoggerOptions = {}): pino.Logger {
  const config: pino.LoggerOptions = {
    level: options.level ?? levelFromEnv(),
    serializers: {
      ...pino.stdSerializers,
      err: pino.stdSerializers.err,
    },
  };
  return options.destination ? pino(config, options.destination) : pino(config);
}

/**
 * Root logger instance.
 *
 * Silent unless `ASSAY_LOG_LEVEL` names a level, so assertion failures do
 * not add noise to test output. Raise the level when debugging.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'debug';
 * rootLogger.debug({ assertion: 'equal' }, 'assertion failed');
 * ```
 *
 * @public
 */
const rootLogger = createRootLogger();

export { rootLogger };
