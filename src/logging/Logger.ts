/**
 * Logger Class
 * Level-filtered structured logging to stderr or to a log file.
 * stdout is reserved for the MCP stdio transport, so console output goes to stderr.
 */

import * as fs from 'fs';
import * as path from 'path';
import { types } from 'util';
import { LogDestination, LogLevel } from '../config/types';
import type { LauncherConfiguration } from '../config/types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3
};

export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  destination: LogDestination;
  logFile?: string | undefined;
  component?: string | undefined;
}

export class Logger {
  private readonly options: LoggerOptions;
  private fileReady = false;

  constructor(options: LoggerOptions) {
    this.options = options;
  }

  public error(message: string, fields?: LogFields): void {
    this.write(LogLevel.ERROR, message, fields);
  }

  public warn(message: string, fields?: LogFields): void {
    this.write(LogLevel.WARN, message, fields);
  }

  public info(message: string, fields?: LogFields): void {
    this.write(LogLevel.INFO, message, fields);
  }

  public debug(message: string, fields?: LogFields): void {
    this.write(LogLevel.DEBUG, message, fields);
  }

  /**
   * Logger for a named component sharing this logger's settings
   */
  public child(component: string): Logger {
    return new Logger({ ...this.options, component });
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.options.level];
  }

  public formatLine(level: LogLevel, message: string, fields?: LogFields, timestamp: Date = new Date()): string {
    const component = this.options.component ? ` ${this.options.component}:` : '';
    const details = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields, errorReplacer)}` : '';
    return `${timestamp.toISOString()} [${level.toUpperCase()}]${component} ${message}${details}`;
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const line = this.formatLine(level, message, fields);

    if (this.options.destination === LogDestination.FILE && this.options.logFile) {
      try {
        this.ensureLogDirectory(this.options.logFile);
        fs.appendFileSync(this.options.logFile, `${line}\n`, 'utf8');
        return;
      } catch (error) {
        console.error(`Failed to write log file ${this.options.logFile}:`, error);
      }
    }

    console.error(line);
  }

  private ensureLogDirectory(logFile: string): void {
    if (this.fileReady) {
      return;
    }
    fs.mkdirSync(path.dirname(logFile), { recursive: true, mode: 0o700 });
    this.fileReady = true;
  }

  /**
   * Static factory method to create a Logger from the launcher configuration
   */
  public static fromConfiguration(config: LauncherConfiguration, component?: string): Logger {
    return new Logger({
      level: config.logLevel,
      destination: config.logDestination,
      logFile: config.logFile,
      component
    });
  }

  /**
   * Logger that only reports errors, for components created without one
   */
  public static createDefault(component?: string): Logger {
    return new Logger({ level: LogLevel.ERROR, destination: LogDestination.CONSOLE, component });
  }
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (types.isNativeError(value)) {
    return { name: value.name, message: value.message };
  }
  return value;
}
