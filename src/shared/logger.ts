export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: string): void {
  if (isLogLevel(level)) currentLevel = level;
}

function format(component: string, message: string, data?: Record<string, unknown>): string {
  const base = `[${component}] ${message}`;
  return data && Object.keys(data).length > 0 ? `${base} ${JSON.stringify(data)}` : base;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function createLogger(component: string): Logger {
  const emit = (level: LogLevel, sink: (line: string) => void) => (message: string, data?: Record<string, unknown>) => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;
    sink(format(component, message, data));
  };
  /* eslint-disable no-console */
  return {
    debug: emit('debug', (l) => console.debug(l)),
    info: emit('info', (l) => console.info(l)),
    warn: emit('warn', (l) => console.warn(l)),
    error: emit('error', (l) => console.error(l))
  };
  /* eslint-enable no-console */
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
