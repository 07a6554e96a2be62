import { ConsoleLogger, ScopedLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';
export type { JsonlLoggerOptions } from './jsonlLogger';

export { ConsoleLogger, ScopedLogger, JsonlLogger };
