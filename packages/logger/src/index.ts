export { configureLogger, formatLabel, getLogger, type Logger, type LoggerConfig } from './logger.js';
export { logLevels, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
