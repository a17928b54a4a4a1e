/**
 * Console logger with a process-wide level
 *
 * Lines look like `2026-01-05T10:00:00.000Z - monitor - INFO - Found 12 subscriptions`
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatLine(scope: string, level: LogLevel, message: string): string {
  return `${new Date().toISOString()} - ${scope} - ${level.toUpperCase()} - ${message}`;
}

/**
 * Create a logger tagged with a scope name
 */
export function createLogger(scope: string) {
  return {
    debug(message: string, ...details: unknown[]): void {
      if (isEnabled('debug')) {
        console.log(formatLine(scope, 'debug', message), ...details);
      }
    },

    info(message: string, ...details: unknown[]): void {
      if (isEnabled('info')) {
        console.log(formatLine(scope, 'info', message), ...details);
      }
    },

    warn(message: string, ...details: unknown[]): void {
      if (isEnabled('warn')) {
        console.warn(formatLine(scope, 'warn', message), ...details);
      }
    },

    error(message: string, ...details: unknown[]): void {
      if (isEnabled('error')) {
        console.error(formatLine(scope, 'error', message), ...details);
      }
    },
  };
}

export type Logger = ReturnType<typeof createLogger>;
