/**
 * Console logger
 *
 * Coloured, levelled output to stderr. Debug lines are only written when
 * debugging is switched on (`--debug` or the CHECKPOST_DEBUG variable).
 */

import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogWriter {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  debug?: boolean;
  output?: LogWriter;
  colors?: ChalkInstance;
}

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
};

export class Logger {
  private readonly output: LogWriter;
  private readonly colors: ChalkInstance;
  private debugEnabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.output = options.output ?? process.stderr;
    this.colors = options.colors ?? chalk;
    this.debugEnabled = options.debug ?? Boolean(process.env.CHECKPOST_DEBUG);
  }

  /** A logger that writes nothing, for library callers and tests */
  static silent(): Logger {
    return new Logger({ output: { write: () => true }, debug: false });
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      this.write('debug', message);
    }
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: LogLevel, message: string): void {
    const label = this.colorize(level, LEVEL_LABEL[level]);
    this.output.write(`${label} ${message}\n`);
  }

  private colorize(level: LogLevel, text: string): string {
    switch (level) {
      case 'debug':
        return this.colors.gray(text);
      case 'info':
        return this.colors.cyan(text);
      case 'warn':
        return this.colors.yellow(text);
      case 'error':
        return this.colors.red(text);
    }
  }
}
