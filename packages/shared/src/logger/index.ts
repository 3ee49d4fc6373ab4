import { ConsoleLogger, ScopedLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export { isLevelEnabled } from './types';

export { ConsoleLogger, ScopedLogger, JsonlLogger };
