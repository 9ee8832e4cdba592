/**
 * Core module exports
 */
export { logger, configureLogger, createChildLogger, type LogLevel } from './Logger.js';
export { HttpClient, type HttpClientOptions } from './HttpClient.js';
export { runWorkerPool } from './WorkerPool.js';
export { Application, type ApplicationOptions, type ExitCode, type RunOutcome } from './Application.js';
export * from './errors.js';
