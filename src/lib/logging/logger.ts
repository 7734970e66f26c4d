import pino from 'pino';

export type Logger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

const logger = pino({
  name: 'feeder-watch',
  level: process.env.LOG_LEVEL ?? 'info'
});

export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
}

export default logger;
