// Log levels enum
export enum LogLevel {
  SILLY = 0,
  TRACE = 1,
  DEBUG = 2,
  INFO = 3,
  WARN = 4,
  ERROR = 5,
  FATAL = 6,
}

type LevelName = 'silly' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Logger = Record<LevelName, (message: string, ...args: unknown[]) => void> & {
  child: (scope: string) => Logger;
};

const LEVELS: Record<LevelName, LogLevel> = {
  silly: LogLevel.SILLY,
  trace: LogLevel.TRACE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  fatal: LogLevel.FATAL,
};

const getTimestamp = (): string => {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const milliseconds = String(now.getMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${milliseconds}`;
};

const isLevelName = (value: string): value is LevelName => Object.hasOwn(LEVELS, value);

// Read on every call so LOG_LEVEL can be flipped at runtime
const getCurrentLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLevelName(level)) return LEVELS[level];
  return LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => level >= getCurrentLogLevel();

// console.* prints bigint with an `n` suffix inside objects; render them as plain decimals
const renderArg = (arg: unknown): unknown => {
  if (typeof arg === 'bigint') return arg.toString();
  if (arg instanceof Error) return arg;
  if (Array.isArray(arg)) return arg.map(renderArg);
  if (arg && typeof arg === 'object') {
    return Object.fromEntries(Object.entries(arg).map(([k, v]) => [k, renderArg(v)]));
  }
  return arg;
};

const sinkFor = (name: LevelName) => {
  switch (name) {
    case 'silly':
    case 'trace':
    case 'debug':
      return console.debug;
    case 'info':
      return console.info;
    case 'warn':
      return console.warn;
    default:
      return console.error;
  }
};

// Console-based logger with timestamps, level filtering and optional [scope] prefixes
const createLogger = (scopes: string[] = []): Logger => {
  const prefix = scopes.map((s) => `[${s}] `).join('');
  const emit =
    (name: LevelName) =>
    (message: string, ...args: unknown[]) => {
      if (!shouldLog(LEVELS[name])) return;
      sinkFor(name)(
        `${getTimestamp()} [${name.toUpperCase()}] ${prefix}${message}`,
        ...args.map(renderArg),
      );
    };

  return {
    silly: emit('silly'),
    trace: emit('trace'),
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    fatal: emit('fatal'),
    child: (scope: string) => createLogger([...scopes, scope]),
  };
};

// Export the logger instance
export const log = createLogger();
