import pino from 'pino';
import { Environment, getEnvironment } from '../config/environment.js';

export function createLogger(env: Environment = getEnvironment()): pino.Logger {
  return pino({
    level: env.LOG_LEVEL,
    transport:
      env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  });
}
