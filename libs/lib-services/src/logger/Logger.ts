import winston from 'winston';

const prefixFormat = winston.format((info) => {
  if (info.prefix) {
    info.message = `${info.prefix}${info.message}`;
  }
  return {
    ...info,
    prefix: undefined
  };
});

export namespace LogFormat {
  export const development = winston.format.combine(
    prefixFormat(),
    winston.format.colorize({ level: true }),
    winston.format.simple()
  );
  export const production = winston.format.combine(prefixFormat(), winston.format.timestamp(), winston.format.json());
}

export type Logger = winston.Logger;

/**
 * Levels accepted by {@link setLogLevel}, most severe first.
 */
export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const isLogLevel = (level: string): level is LogLevel => {
  return LOG_LEVELS.some((l) => l == level);
};

export const logger = winston.createLogger();

// Configure logging to console as the default
logger.configure({
  level: 'info',
  format: process.env.NODE_ENV == 'production' ? LogFormat.production : LogFormat.development,
  transports: [new winston.transports.Console()]
});

/**
 * Changes the level of the root logger at runtime. Child loggers inherit it.
 */
export const setLogLevel = (level: LogLevel) => {
  logger.level = level;
};
