/**
 * Structured console logging
 *
 * Each entry is one JSON line. Token values, secrets and cookies must never
 * be passed as fields.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(component: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveLevel(level?: string): LogLevel {
  const raw = level ?? process.env['LOG_LEVEL'] ?? 'info';
  return isLogLevel(raw) ? raw : 'info';
}

/**
 * Create a logger for a component
 */
export function createLogger(component: string, level?: LogLevel): Logger {
  const threshold = LEVEL_ORDER[resolveLevel(level)];

  const write = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: entryLevel,
      component,
      message,
      ...fields,
    });

    if (entryLevel === 'error') {
      console.error(line);
    } else if (entryLevel === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (name) => createLogger(`${component}:${name}`, level),
  };
}

/**
 * Render an unknown thrown value for a log field
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
