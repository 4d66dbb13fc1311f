import chalk from 'chalk';
import { isLogLevelEnabled, type LogLevel, type LogMeta, type Logger } from '@reelsmith/core';

export interface CliLoggerOptions {
  level: LogLevel;
  /** Line sink; defaults to stderr so stdout stays free for command output */
  write?: (line: string) => void;
  /** Timestamp source, mainly for tests */
  now?: () => Date;
}

function levelLabel(level: LogLevel): string {
  switch (level) {
    case 'debug':
      return chalk.gray('debug');
    case 'info':
      return chalk.cyan('info ');
    case 'warn':
      return chalk.yellow('warn ');
    case 'error':
      return chalk.red('error');
  }
}

function formatMetaValue(value: unknown): string {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

export function formatLogMeta(meta: LogMeta | undefined): string {
  if (!meta) {
    return '';
  }
  return Object.entries(meta)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatMetaValue(value)}`)
    .join(' ');
}

export function resolveLogLevel(levelFlag: string | undefined): LogLevel {
  if (levelFlag === undefined || levelFlag === 'info') {
    return 'info';
  }
  if (levelFlag === 'debug') {
    return 'debug';
  }
  throw new Error('Invalid log level. Use "info" or "debug".');
}

export function createCliLogger(options: CliLoggerOptions): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (!isLogLevelEnabled(level, options.level)) {
      return;
    }
    const time = chalk.dim(now().toISOString().slice(11, 23));
    const details = formatLogMeta(meta);
    write([time, levelLabel(level), message, details && chalk.dim(details)].filter(Boolean).join(' '));
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
