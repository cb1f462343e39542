import env, { type LogLevel } from './env';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type Logger = {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
};

const sinks: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.log(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function createLogger(scope: string, threshold: LogLevel = env.LOG_LEVEL): Logger {
  const emit =
    (level: LogLevel) =>
    (message: string, ...details: unknown[]) => {
      if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[threshold]) {
        return;
      }
      sinks[level](`[${level.toUpperCase()}] [${scope}] ${message}`, ...details);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
