import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';

export const logger = pino({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname'
          }
        }
      : undefined
});

export function createLogger(module: string) {
  return logger.child({ module });
}

export const apiLogger = createLogger('api');
export const dbLogger = createLogger('db');
export const diaryLogger = createLogger('diary');
export const summaryLogger = createLogger('summary');
export const aiLogger = createLogger('ai');
