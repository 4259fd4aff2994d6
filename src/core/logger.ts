export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/**
 * Serialize a value for logging, handling Error objects specially
 */
function serializeArg(arg: unknown): string {
  if (arg instanceof Error) {
    const errorObj: Record<string, unknown> = {
      name: arg.name,
      message: arg.message,
    };
    if (arg.stack) {
      errorObj.stack = arg.stack;
    }
    return JSON.stringify(errorObj);
  }
  if (typeof arg === 'string') {
    return arg;
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

function format(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): string {
  const suffix = args.length > 0 ? ` ${args.map(serializeArg).join(' ')}` : '';
  return `[${level.toUpperCase()}] ${new Date().toISOString()} - ${message}${suffix}`;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (enabled('debug')) console.debug(format('debug', message, args));
  },
  info: (message: string, ...args: unknown[]) => {
    if (enabled('info')) console.log(format('info', message, args));
  },
  warn: (message: string, ...args: unknown[]) => {
    if (enabled('warn')) console.warn(format('warn', message, args));
  },
  error: (message: string, ...args: unknown[]) => {
    if (enabled('error')) console.error(format('error', message, args));
  },
};
