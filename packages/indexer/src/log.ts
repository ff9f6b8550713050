export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const envLevel = process.env.CODE_RECALL_LOG_LEVEL ?? '';
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, err?: unknown): void;
  error(message: string, err?: unknown): void;
}

/**
 * Scoped console logger. Everything goes to stderr so stdout carries only
 * command output (and descriptive-mode mutations).
 */
export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, err?: unknown) => {
    if (rank[level] < rank[threshold]) return;
    const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${scope}] ${message}`;
    // eslint-disable-next-line no-console
    if (err === undefined) console.error(line);
    // eslint-disable-next-line no-console
    else console.error(line, err instanceof Error ? err.message : err);
  };
  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: (message, err) => write('warn', message, err),
    error: (message, err) => write('error', message, err),
  };
}
