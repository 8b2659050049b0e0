import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: chalk.dim('debug'),
  info: chalk.blue('info'),
  warn: chalk.yellow('warn'),
  error: chalk.red('error'),
};

/** Writes `level message key=value ...` to stderr, keeping stdout for results. */
export const defaultLogHandler: LogHandler = ({ level, message, context }) => {
  const fields = Object.entries(context).map(([key, value]) => chalk.dim(`${key}=${formatValue(value)}`));
  console.error([LEVEL_LABEL[level], message, ...fields].join(' '));
};

let handler: LogHandler = defaultLogHandler;
let minLevel: LogLevel = 'info';

/** Replace the log handler (e.g. to capture logs in tests). */
export function setLogHandler(next: LogHandler): void {
  handler = next;
}

/** Messages below this level are dropped. */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
    handler({ level, message, context: { ...baseContext, ...context }, timestamp: new Date() });
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export const logger = createLogger();
