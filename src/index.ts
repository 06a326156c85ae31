// Public library surface of toolbox

export * from './core/errors.js';
export { Logger, LogLevel, logger, toLogLevel, type LogLevelName, type LoggerConfig } from './core/logger.js';
export * from './core/schemas.js';
export * from './services/config/config-service.js';
export * from './services/http/index.js';
export * from './services/trace/index.js';
export * from './services/decode/index.js';
export * from './services/hooks/index.js';
