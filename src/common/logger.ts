// logger.ts - Component-scoped logging for the analyzer (stderr, optional rotated file)
import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export type LogData = Record<string, unknown>;

export interface LoggerOptions {
  minLevel?: LogLevel;
  // When set, every line is also appended to <logDir>/<component>.log
  logDir?: string | null;
}

/**
 * The subset of the logger that analysis classes depend on. Tests hand in
 * jest.fn() objects of this shape.
 */
export type AnalyzerLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export class Logger {
  private logFile: string | null = null;
  private component: string;
  private minLevel: LogLevel;
  private maxFileSize: number = 10 * 1024 * 1024; // 10MB
  private maxFiles: number = 5;

  constructor(component: string, options: LoggerOptions = {}) {
    this.component = component;
    this.minLevel = options.minLevel ?? LogLevel.INFO;

    if (options.logDir) {
      try {
        fs.mkdirSync(options.logDir, { recursive: true });
        this.logFile = path.join(options.logDir, `${component}.log`);
        this.rotateLogsIfNeeded();
      } catch (error) {
        process.stderr.write(`Log directory ${options.logDir} unusable, logging to stderr only: ${String(error)}\n`);
        this.logFile = null;
      }
    }
  }

  public child(component: string): Logger {
    const logger = new Logger(component, { minLevel: this.minLevel });
    logger.logFile = this.logFile;
    return logger;
  }

  private rotateLogsIfNeeded(): void {
    if (!this.logFile) return;
    try {
      if (!fs.existsSync(this.logFile)) {
        return;
      }

      const stats = fs.statSync(this.logFile);

      if (stats.size >= this.maxFileSize) {
        for (let i = this.maxFiles - 1; i > 0; i--) {
          const oldFile = `${this.logFile}.${i}`;
          const newFile = `${this.logFile}.${i + 1}`;

          if (fs.existsSync(oldFile)) {
            if (i === this.maxFiles - 1) {
              fs.unlinkSync(oldFile); // Delete oldest
            } else {
              fs.renameSync(oldFile, newFile);
            }
          }
        }

        fs.renameSync(this.logFile, `${this.logFile}.1`);
      }
    } catch (error) {
      process.stderr.write(`Error rotating logs: ${String(error)}\n`);
    }
  }

  public formatMessage(level: LogLevel, message: string, data?: LogData, error?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];

    let logLine = `[${timestamp}] [${levelName}] [${this.component}] ${message}`;

    if (data && Object.keys(data).length > 0) {
      logLine += `\n  Data: ${JSON.stringify(data, null, 2)}`;
    }

    if (error !== undefined) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logLine += `\n  Error: ${errorMessage}`;
      if (error instanceof Error && error.stack && level >= LogLevel.ERROR) {
        logLine += `\n  Stack: ${error.stack}`;
      }
    }

    return logLine + '\n';
  }

  private writeLog(level: LogLevel, message: string, data?: LogData, error?: unknown): void {
    if (level < this.minLevel) {
      return;
    }

    const logMessage = this.formatMessage(level, message, data, error);

    // stdout carries the report
    process.stderr.write(logMessage);

    if (!this.logFile) return;
    try {
      fs.appendFileSync(this.logFile, logMessage);
      this.rotateLogsIfNeeded();
    } catch (err) {
      process.stderr.write(`Failed to write log: ${String(err)}\n`);
    }
  }

  public debug(message: string, data?: LogData): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  public info(message: string, data?: LogData): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  public warn(message: string, data?: LogData, error?: unknown): void {
    this.writeLog(LogLevel.WARN, message, data, error);
  }

  public error(message: string, error?: unknown, data?: LogData): void {
    this.writeLog(LogLevel.ERROR, message, data, error);
  }
}

export function createLogger(component: string, debug: boolean, logDir: string | null): Logger {
  return new Logger(component, {
    minLevel: debug ? LogLevel.DEBUG : LogLevel.INFO,
    logDir
  });
}

export default Logger;
