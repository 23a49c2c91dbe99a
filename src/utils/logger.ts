import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SUCCESS = 'SUCCESS'
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SUCCESS];

export type LogWriter = (line: string, ...args: unknown[]) => void;

/**
 * Process-wide logger.
 *
 * Everything goes to stderr: stdout is reserved for the JSON documents the
 * `run` and `eval` commands emit.
 */
class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;
  private writer: LogWriter = (line, ...args) => console.error(line, ...args);

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel) {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  setWriter(writer: LogWriter) {
    this.writer = writer;
  }

  debug(message: string, ...args: unknown[]) {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]) {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, error?: unknown, ...args: unknown[]) {
    this.log(LogLevel.ERROR, message, ...args);
    if (error instanceof Error) {
      this.writer(chalk.red(error.stack || error.message));
    } else if (error) {
      this.writer(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  success(message: string, ...args: unknown[]) {
    this.log(LogLevel.SUCCESS, message, ...args);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]) {
    const currentLevelIndex = LEVEL_ORDER.indexOf(this.logLevel);
    const messageLevelIndex = LEVEL_ORDER.indexOf(level);

    if (messageLevelIndex < currentLevelIndex && level !== LogLevel.SUCCESS) {
      return;
    }

    const timestamp = new Date().toISOString();
    const prefix = this.getPrefix(level);
    this.writer(`${chalk.gray(timestamp)} ${prefix} ${message}`, ...args);
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return chalk.gray('[DEBUG]');
      case LogLevel.INFO:
        return chalk.blue('[INFO]');
      case LogLevel.WARN:
        return chalk.yellow('[WARN]');
      case LogLevel.ERROR:
        return chalk.red('[ERROR]');
      case LogLevel.SUCCESS:
        return chalk.green('[SUCCESS]');
      default:
        return '';
    }
  }
}

export const logger = Logger.getInstance();
