export const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LEVELS;

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

function describe(data: unknown): unknown {
  if (data instanceof Error) {
    return data.cause !== undefined ? `${data.message} (cause: ${String(describe(data.cause))})` : data.message;
  }
  return data;
}

function log(level: LogLevel, module: string, msg: string, data?: unknown): void {
  if (LEVELS[level] < LEVELS[currentLevel]) return;
  const ts = new Date().toISOString();
  const prefix = `[${ts}] [${level.toUpperCase()}] [${module}]`;
  if (data !== undefined) {
    console.log(`${prefix} ${msg}`, describe(data));
  } else {
    console.log(`${prefix} ${msg}`);
  }
}

// Global once-keys shared across all loggers
const seenOnce = new Set<string>();

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(module: string) {
  return {
    debug: (msg: string, data?: unknown) => log('debug', module, msg, data),
    info: (msg: string, data?: unknown) => log('info', module, msg, data),
    warn: (msg: string, data?: unknown) => log('warn', module, msg, data),
    error: (msg: string, data?: unknown) => log('error', module, msg, data),
    /** Log at warn level only the first time this key is seen. */
    warnOnce: (key: string, msg: string, data?: unknown) => {
      if (seenOnce.has(key)) return;
      seenOnce.add(key);
      log('warn', module, msg, data);
    },
    /** Reset a warnOnce key so it can fire again (e.g. on recovery). */
    clearOnce: (key: string) => { seenOnce.delete(key); },
  };
}
