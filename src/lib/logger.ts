import { config, type LogLevel } from '../config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const formatMessage = (level: LogLevel, message: string): string => {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
};

const enabled = (level: LogLevel): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[config.logLevel];

export const logger = {
  debug: (message: string): void => {
    if (enabled('debug')) {
      console.debug(formatMessage('debug', message));
    }
  },
  info: (message: string): void => {
    if (enabled('info')) {
      console.info(formatMessage('info', message));
    }
  },
  warn: (message: string, error?: Error): void => {
    if (!enabled('warn')) return;
    console.warn(formatMessage('warn', message));
    if (error) {
      console.warn(error.stack || error.message);
    }
  },
  error: (message: string, error?: Error): void => {
    console.error(formatMessage('error', message));
    if (error) {
      console.error(error.stack || error.message);
    }
  },
};
