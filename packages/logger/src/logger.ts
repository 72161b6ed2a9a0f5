import os from 'node:os';

import { pino, stdTimeFunctions, type DestinationStream, type LoggerOptions, type Logger as PinoLogger } from 'pino';

import { validateLoggerEnv, type LogLevel } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

export type Logger = PinoLogger;

export interface LoggerConfig {
  /** Minimum level for every category logger */
  level?: LogLevel | undefined;
  /** Write to this stream instead of the configured transports */
  destination?: DestinationStream | undefined;
  /** Force console output on stderr regardless of LOGGER_CONSOLE_ENABLED */
  console?: boolean | undefined;
}

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

// Cache for loggers
const loggerCache = new Map<string, Logger>();

// Root logger instance
let rootLogger: Logger | undefined;

let loggerConfig: LoggerConfig = {};

const noopStream: DestinationStream = {
  write(_msg: string) {
    // discard
  },
};

function isTestEnv(): boolean {
  // Check both the validated env and process.env (in case vitest sets it after module load)
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function currentLevel(): LogLevel {
  return loggerConfig.level ?? env.LOGGER_LOG_LEVEL;
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  interface TransportTarget {
    level: string;
    options: Record<string, unknown>;
    target: string;
  }

  const pinoConfig: LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: currentLevel(),
    timestamp: stdTimeFunctions.isoTime,
  };

  // An explicit destination wins over transports (used by tests and embedding callers)
  if (loggerConfig.destination) {
    return pino(pinoConfig, loggerConfig.destination);
  }

  // In test mode, use a noop stream to suppress all output without spawning transport workers
  if (isTestEnv()) {
    return pino(pinoConfig, noopStream);
  }

  const transportTargets: TransportTarget[] = [];

  // Console output goes to stderr so command output on stdout stays parseable
  if (loggerConfig.console ?? env.LOGGER_CONSOLE_ENABLED) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      transportTargets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (env.LOGGER_FILE_LOG_ENABLED) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: `./${env.LOGGER_FILE_LOG_DIRNAME}/${env.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  if (transportTargets.length === 0) {
    return pino(pinoConfig, noopStream);
  }

  pinoConfig.transport = { targets: transportTargets };
  return pino(pinoConfig);
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child(
    {
      category,
      categoryLabel: formatLabel(category, 25),
    },
    { level: currentLevel() }
  );

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that follows configureLogger.
 *
 * Modules take their logger at top level, before the CLI has parsed its
 * options, so the returned Proxy looks up the current pino logger on every
 * property access.
 */
export function getLogger(category: string): Logger {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
}

/**
 * Replace the logger configuration. Loggers already handed out by getLogger
 * use the new settings from their next call.
 */
export function configureLogger(config: LoggerConfig): void {
  loggerConfig = { ...config };
  rootLogger = undefined;
  loggerCache.clear();
}
