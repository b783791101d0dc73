const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LEVELS;

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function log(level: LogLevel, module: string, msg: string, data?: unknown): void {
  if (LEVELS[level] < LEVELS[currentLevel]) return;
  const ts = new Date().toISOString();
  const prefix = `[${ts}] [${level.toUpperCase()}] [${module}]`;
  const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  if (data instanceof Error) {
    write(`${prefix} ${msg}: ${data.message}`);
  } else if (data !== undefined) {
    write(`${prefix} ${msg}`, data);
  } else {
    write(`${prefix} ${msg}`);
  }
}

export interface Logger {
  debug: (msg: string, data?: unknown) => void;
  info: (msg: string, data?: unknown) => void;
  warn: (msg: string, data?: unknown) => void;
  error: (msg: string, data?: unknown) => void;
}

export function createLogger(module: string): Logger {
  return {
    debug: (msg, data) => log('debug', module, msg, data),
    info: (msg, data) => log('info', module, msg, data),
    warn: (msg, data) => log('warn', module, msg, data),
    error: (msg, data) => log('error', module, msg, data),
  };
}
