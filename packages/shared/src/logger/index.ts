import { ConsoleLogger, SilentLogger } from './consoleLogger';
export type { Logger } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export { ConsoleLogger, SilentLogger };
