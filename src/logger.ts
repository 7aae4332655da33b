// Node.js built-in modules
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// Third-party dependencies
import chalk from 'chalk';
import * as fsExtra from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';

// Log levels
export enum LogLevel {
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG',
}

export interface LoggerOptions {
  title: string; // Shown in the log file banners, e.g. "BUCKET MIGRATION"
  verbose?: boolean;
  logFile?: string;
}

let options: LoggerOptions | null = null;
let logStream: fs.WriteStream | null = null;
let executionId: string = uuidv4();

/**
 * Initialize the logger for one command execution
 */
export function initLogger(loggerOptions: LoggerOptions): void {
  options = loggerOptions;
  executionId = uuidv4();

  // If log file is specified, create or append to the file
  if (loggerOptions.logFile) {
    try {
      fsExtra.ensureDirSync(path.dirname(loggerOptions.logFile));

      logStream = fs.createWriteStream(loggerOptions.logFile, { flags: 'a' });

      const timestamp = new Date().toISOString();
      const processInfo = `PID: ${process.pid}, User: ${process.env.USERNAME || process.env.USER || 'unknown'}`;
      const systemInfo = `OS: ${os.platform()} ${os.release()}, Hostname: ${os.hostname()}`;

      logStream.write('\n');
      logStream.write('='.repeat(80) + '\n');
      logStream.write(`== ${loggerOptions.title} STARTED AT ${timestamp} ==\n`);
      logStream.write(`== Execution ID: ${executionId} ==\n`);
      logStream.write(`== ${processInfo} ==\n`);
      logStream.write(`== ${systemInfo} ==\n`);
      logStream.write('='.repeat(80) + '\n\n');
    } catch (error) {
      // Continue without file logging
      console.error(chalk.red(`Failed to open log file: ${error instanceof Error ? error.message : String(error)}`));
      logStream = null;
    }
  }
}

/**
 * Close the logger and release the log file
 */
export function closeLogger(): void {
  if (logStream) {
    const timestamp = new Date().toISOString();

    logStream.write('\n');
    logStream.write('='.repeat(80) + '\n');
    logStream.write(`== ${options?.title ?? 'EXECUTION'} COMPLETED AT ${timestamp} ==\n`);
    logStream.write(`== Execution ID: ${executionId} ==\n`);
    logStream.write('='.repeat(80) + '\n');

    logStream.end();
    logStream = null;
  }
  options = null;
}

/**
 * Log a message with the specified level
 */
export function log(level: LogLevel, message: string, skipConsole = false): void {
  if (logStream) {
    logStream.write(`[${new Date().toISOString()}] [${level}] [${executionId}] ${message}\n`);
  }

  if (skipConsole) {
    return;
  }

  // Debug lines only reach the console in verbose mode
  if (level === LogLevel.DEBUG && !options?.verbose) {
    return;
  }

  console.log(formatConsoleMessage(level, message));
}

/**
 * Prefix and color a message for console output
 */
export function formatConsoleMessage(level: LogLevel, message: string): string {
  switch (level) {
    case LogLevel.INFO:
      return chalk.blue(`[INFO] ${message}`);
    case LogLevel.SUCCESS:
      return chalk.green(`[SUCCESS] ${message}`);
    case LogLevel.WARNING:
      return chalk.yellow(`[WARNING] ${message}`);
    case LogLevel.ERROR:
      return chalk.red(`[ERROR] ${message}`);
    case LogLevel.DEBUG:
      return chalk.gray(`[DEBUG] ${message}`);
    default:
      return message;
  }
}

/**
 * Log an error with optional error object details
 */
export function logError(message: string, error?: unknown, skipConsole = false): void {
  log(LogLevel.ERROR, message, skipConsole);

  if (error instanceof Error) {
    const errorDetails = `${error.name}: ${error.message}\n${error.stack || '(No stack trace)'}`;

    // Always log error details to file
    if (logStream) {
      logStream.write(`[${new Date().toISOString()}] [ERROR_DETAILS] [${executionId}] ${errorDetails}\n`);
    }

    if (options?.verbose && !skipConsole) {
      console.log(chalk.red(errorDetails));
    }
  }
}

/**
 * Log verbose information (only in verbose mode or to file)
 */
export function logVerbose(message: string): void {
  log(LogLevel.DEBUG, message);
}

export function logSuccess(message: string): void {
  log(LogLevel.SUCCESS, message);
}

export function logWarning(message: string): void {
  log(LogLevel.WARNING, message);
}

/**
 * Log an info message, optionally with a custom color instead of the level prefix
 */
export function logInfo(message: string, color?: (message: string) => string): void {
  if (color) {
    if (logStream) {
      logStream.write(`[${new Date().toISOString()}] [${LogLevel.INFO}] [${executionId}] ${message}\n`);
    }
    console.log(color(message));
  } else {
    log(LogLevel.INFO, message);
  }
}
