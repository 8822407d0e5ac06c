import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.INFO]: chalk.blue,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
};

function parseLevel(raw: string | undefined): LogLevel {
  const upper = (raw || '').toUpperCase();
  return Object.values(LogLevel).find(level => level === upper) ?? LogLevel.INFO;
}

class Logger {
  private logDir: string;
  private minLevel: LogLevel;
  private toFile: boolean;

  constructor() {
    this.logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
    this.minLevel = parseLevel(process.env.LOG_LEVEL);
    this.toFile = process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false';
    if (this.toFile) {
      fs.ensureDirSync(this.logDir);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.map(arg => {
      if (arg instanceof Error) return arg.stack || arg.message;
      return typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg);
    }).join(' ');
    return `[${timestamp}] [${level}] ${message}${formattedArgs ? ` ${formattedArgs}` : ''}`;
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.enabled(level)) return;
    const formatted = this.formatMessage(level, message, ...args);
    const line = LEVEL_COLOR[level](formatted);
    if (level === LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
    if (this.toFile) {
      const logFile = path.join(this.logDir, `${formatted.slice(1, 11)}.log`);
      fs.appendFileSync(logFile, formatted + '\n');
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.write(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write(LogLevel.ERROR, message, args);
  }

  /** A scrape job state change, e.g. `LIFECYCLE: N123AB:jetphotos running`. */
  lifecycle(level: LogLevel, jobId: string, message: string): void {
    this.write(level, `LIFECYCLE: ${jobId} ${message}`, []);
  }

  /** A source page no longer matches the parser; always logged at ERROR. */
  adapterBroken(source: string, message: string): void {
    this.write(LogLevel.ERROR, `ADAPTER BROKEN: ${source} ${message}`, []);
  }
}

export const logger = new Logger();
