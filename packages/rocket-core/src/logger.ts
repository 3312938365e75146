import winston from 'winston';

export type LogService = 'parser' | 'evaluator' | 'resolver' | 'cli';

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let line = `${timestamp} [${level}]${service ? ` [${service}]` : ''} ${message}`;
    if (Object.keys(metadata).length > 0) {
      line += ` ${JSON.stringify(metadata)}`;
    }
    return line;
  })
);

/**
 * Log level from the environment.
 * ROCKET_LOG_LEVEL wins, then ROCKET_DEBUG, then the default.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.ROCKET_LOG_LEVEL) {
    return env.ROCKET_LOG_LEVEL;
  }
  if (env.ROCKET_DEBUG === 'true') {
    return 'debug';
  }
  return 'warn';
}

const loggers = new Map<LogService, winston.Logger>();
let levelOverride: string | undefined;

/**
 * Service logger. Writes to stderr so stdout carries only the document.
 * Silent under tests unless ROCKET_LOG_LEVEL asks otherwise.
 */
export function createLogger(service: LogService): winston.Logger {
  const existing = loggers.get(service);
  if (existing) {
    return existing;
  }

  const logger = winston.createLogger({
    level: levelOverride ?? resolveLogLevel(),
    silent: process.env.NODE_ENV === 'test' && !process.env.ROCKET_LOG_LEVEL,
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: Object.keys(winston.config.npm.levels),
      }),
    ],
  });

  loggers.set(service, logger);
  return logger;
}

/**
 * Change the level of every service logger, including ones created later
 */
export function setLogLevel(level: string): void {
  levelOverride = level;
  for (const logger of loggers.values()) {
    logger.level = level;
  }
}
