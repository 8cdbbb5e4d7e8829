import type { LogLevel } from './config';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(level: LogLevel): Logger {
  const enabled = (l: LogLevel) => rank[l] >= rank[level];
  const stamp = () => new Date().toISOString();

  return {
    debug(message) {
      if (enabled('debug')) console.debug(`${stamp()} DEBUG ${message}`);
    },
    info(message) {
      if (enabled('info')) console.log(`${stamp()} INFO  ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${stamp()} WARN  ${message}`);
    },
    error(message, err) {
      if (!enabled('error')) return;
      if (err instanceof Error) {
        console.error(`${stamp()} ERROR ${message}\n${err.stack ?? err.message}`);
      } else {
        console.error(`${stamp()} ERROR ${message}`);
      }
    },
  };
}
