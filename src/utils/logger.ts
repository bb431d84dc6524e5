import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmitLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.WARDEN_LOG_LEVEL;
let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

// Synchronous stderr keeps stdout free for command output and loses nothing on exit
const root = pino(
  {
    level: activeLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  pino.destination({ dest: 2, sync: true }),
);

const scoped = new Map<string, pino.Logger>();

/**
 * Changes the level of the root logger and of every scoped child already
 * handed out; pino children copy the level when they are created.
 */
export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
  root.level = level;
  for (const child of scoped.values()) {
    child.level = level;
  }
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  isLevelEnabled(level: EmitLevel): boolean;
}

function scopedLogger(scope: string): pino.Logger {
  let child = scoped.get(scope);
  if (!child) {
    child = root.child({ scope });
    scoped.set(scope, child);
  }
  return child;
}

export function createLogger(scope: string): Logger {
  const child = scopedLogger(scope);

  const write = (level: EmitLevel, message: string, data?: unknown): void => {
    if (data === undefined) {
      child[level](message);
    } else if (data instanceof Error) {
      child[level]({ err: data }, message);
    } else {
      child[level]({ data }, message);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    isLevelEnabled: (level) => child.isLevelEnabled(level),
  };
}
