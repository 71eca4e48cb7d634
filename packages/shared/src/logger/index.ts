export { ConsoleLogger, SilentLogger } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
export type { Logger, MaybePromise } from './types';
