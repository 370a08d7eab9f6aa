export { Logger, createLogger, errorMessage } from './Logger.js';
export type { ILogger, LogEntry, LogFormat, LogSink, LoggerOptions } from './Logger.js';
export { PNG_PRESETS, PngOptimizer } from './PngOptimizer.js';
export { Semaphore, withTimeout } from './concurrency.js';
export { escapeHtml, safeUrl } from './html.js';
