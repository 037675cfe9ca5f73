import pino from 'pino';

const BASE_LEVEL = process.env.LOG_LEVEL ?? 'info';
const IS_TEST = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);

const loggers = new Set<pino.Logger>();
let levelOverride: string | undefined;

export type Logger = pino.Logger;

export function createLogger(name: string): pino.Logger {
  const logger = pino({
    name,
    level: levelOverride ?? BASE_LEVEL,
    transport:
      process.env.NODE_ENV === 'production' || IS_TEST
        ? undefined
        : {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard'
            }
          }
  });
  loggers.add(logger);
  return logger;
}

/** Applies to every logger created so far and to those created later. */
export function setLogLevel(level: pino.LevelWithSilent): void {
  levelOverride = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}
