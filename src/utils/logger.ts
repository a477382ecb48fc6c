import chalk from 'chalk';

type LogLevel = 'info' | 'warn' | 'error' | 'debug' | 'success';

const levelColor: Record<LogLevel, (message: string) => string> = {
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  debug: chalk.gray,
  success: chalk.green
};

const levelLabel: Record<LogLevel, string> = {
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
  debug: 'DEBUG',
  success: 'SUCCESS'
};

const isDebugEnabled = process.env.DEBUG === '1' || process.env.DEBUG === 'true';

export interface Logger {
  info(message: string, payload?: unknown): void;
  warn(message: string, payload?: unknown): void;
  error(message: string, payload?: unknown): void;
  debug(message: string, payload?: unknown): void;
  success(message: string, payload?: unknown): void;
  child(scope: string): Logger;
}

function log(level: LogLevel, scope: string | undefined, message: string, payload?: unknown) {
  if (level === 'debug' && !isDebugEnabled) {
    return;
  }
  const colorize = levelColor[level];
  const label = levelLabel[level];
  const time = new Date().toISOString();
  const prefix = scope ? `${colorize(`[${label}]`)} ${time} ${chalk.magenta(scope)}` : `${colorize(`[${label}]`)} ${time}`;
  if (payload !== undefined) {
    // eslint-disable-next-line no-console
    console.log(`${prefix} ${message}`, payload);
  } else {
    // eslint-disable-next-line no-console
    console.log(`${prefix} ${message}`);
  }
}

export function createLogger(scope?: string): Logger {
  return {
    info: (message, payload) => log('info', scope, message, payload),
    warn: (message, payload) => log('warn', scope, message, payload),
    error: (message, payload) => log('error', scope, message, payload),
    debug: (message, payload) => log('debug', scope, message, payload),
    success: (message, payload) => log('success', scope, message, payload),
    child: (child) => createLogger(scope ? `${scope}:${child}` : child)
  };
}

export const logger = createLogger();
