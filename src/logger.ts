/* leveled console logger */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function format(level: LogLevel, message: string): string {
  return `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[threshold];
}

export const logger = {
  debug(m: string): void {
    if (enabled('debug')) console.debug(format('debug', m));
  },
  info(m: string): void {
    if (enabled('info')) console.info(format('info', m));
  },
  warn(m: string): void {
    if (enabled('warn')) console.warn(format('warn', m));
  },
  error(m: string): void {
    if (enabled('error')) console.error(format('error', m));
  },
};
