import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export { LOG_LEVELS, isLevelEnabled } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger };
