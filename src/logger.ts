import pino from 'pino';
import { config } from './config/env';

export function createLogger(name: string) {
  return pino({
    name,
    level: config.LOG_LEVEL,
    transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined
  });
}
