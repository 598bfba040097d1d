/**
 * Micro-logger: level-filtered console wrapper, small enough to ship in the bundle.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Meta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatMeta(meta?: Meta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  return ' ' + JSON.stringify(meta);
}

function log(level: Exclude<LogLevel, 'silent'>, message: string, meta?: Meta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;
  switch (level) {
    case 'debug':
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export function debug(message: string, meta?: Meta): void {
  log('debug', message, meta);
}

export function info(message: string, meta?: Meta): void {
  log('info', message, meta);
}

export function warn(message: string, meta?: Meta): void {
  log('warn', message, meta);
}

export function error(message: string, meta?: Meta): void {
  log('error', message, meta);
}

/**
 * Logger with `context` merged into the meta of every call.
 */
export function withContext(context: Meta): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}
