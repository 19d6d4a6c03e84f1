export * from './domain/network';
export { IPNetworkError } from './core/errors';
export type { IPNetworkErrorCode, Result } from './core/errors';
export { Logger } from './core/Logger';
export type { LogLevel, NetworkLog, LogSubscriber, LogFilter, LoggerConfig } from './core/Logger';
