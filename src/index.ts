import 'reflect-metadata';

export * from './core';
export { config, loadConfig } from './config';
export type { Config } from './config';
export { log, createLogger } from './utils/logger';
export type { LoggerOptions, LogMeta } from './utils/logger';
export { AppError, ValidationError, handleError } from './utils/errors';
