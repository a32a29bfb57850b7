/**
 * Logging infrastructure exports
 */

export {
  rootLogger,
  createRootLogger,
  levelFromEnv,
} from './pino-setup.js';
export type { RootLoggerOptions } from './pino-setup.js';

export { PinoLogger, NoOpLogger, createScopedLogger } from '../logger.js';
export type { ILogger } from '../logger.js';
