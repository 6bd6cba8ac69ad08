import chalk from 'chalk';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(levels, value);
}

// Read on every call so LOG_LEVEL can be changed after import (tests, --verbose)
function threshold(): LogLevel {
  const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[threshold()];
}

export const logger = {
  debug(...args: unknown[]) {
    if (shouldLog('debug')) {
      console.log(chalk.gray('[debug]'), ...args);
    }
  },

  info(...args: unknown[]) {
    if (shouldLog('info')) {
      console.log(chalk.blue('[info]'), ...args);
    }
  },

  warn(...args: unknown[]) {
    if (shouldLog('warn')) {
      console.log(chalk.yellow('[warn]'), ...args);
    }
  },

  error(...args: unknown[]) {
    if (shouldLog('error')) {
      console.error(chalk.red('[error]'), ...args);
    }
  },
};
