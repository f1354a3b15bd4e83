import pino, { type Logger } from 'pino';

function createLogger(): Logger {
  const explicitLevel = process.env.LOG_LEVEL;
  const silent = process.env.NODE_ENV === 'test' && !explicitLevel;

  return pino({
    level: silent ? 'silent' : (explicitLevel ?? 'info'),
    transport:
      process.env.LOG_PRETTY === '1'
        ? { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } }
        : undefined,
  });
}

export const logger = createLogger();
