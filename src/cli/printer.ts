import chalk, { type ChalkInstance } from 'chalk';
import type { HookStatus, HookUnit, ResultSink } from '../types/index.js';
import { Logger, type LogWriter } from '../utils/logger.js';

const HEADER_WIDTH = 70;

export interface PrinterOptions {
  hookType: string;
  output?: LogWriter;
  colors?: ChalkInstance;
  logger?: Logger;
}

/**
 * Terminal output for a hook run
 */
export class Printer implements ResultSink {
  private readonly hookType: string;
  private readonly output: LogWriter;
  private readonly colors: ChalkInstance;
  private readonly logger: Logger;

  constructor(options: PrinterOptions) {
    this.hookType = options.hookType;
    this.output = options.output ?? process.stdout;
    this.colors = options.colors ?? chalk;
    this.logger = options.logger ?? Logger.silent();
  }

  startRun(): void {
    this.line(this.colors.bold(`Running ${this.hookType} hooks`));
  }

  nothingToRun(): void {
    this.logger.debug(`✓ No applicable ${this.hookType} hooks to run`);
  }

  startHook(hook: HookUnit): void {
    if (!hook.quiet) {
      this.printHeader(hook);
    }
  }

  endHook(hook: HookUnit, status: HookStatus, output: string): void {
    // Quiet hooks only show up when something went wrong
    if (hook.quiet && status === 'pass') {
      return;
    }
    if (hook.quiet) {
      this.printHeader(hook);
    }
    this.printResult(status, output);
  }

  hookSkipped(hook: HookUnit): void {
    this.line(this.colors.yellow(`Skipping ${hook.name}`));
  }

  requiredHookNotSkipped(hook: HookUnit): void {
    this.line(this.colors.yellow(`Cannot skip ${hook.name} since it is set as \`required\``));
  }

  runSucceeded(): void {
    this.line(this.colors.green(`✓ All ${this.hookType} hooks passed`));
  }

  runWarned(): void {
    this.line(this.colors.yellow(`⚠ All ${this.hookType} hooks passed, but with warnings`));
  }

  runFailed(): void {
    this.line();
    this.line(this.colors.red(`✗ One or more ${this.hookType} hooks failed`));
    this.line();
  }

  runInterrupted(): void {
    this.line();
    this.line(this.colors.yellow('⚠ Hook run interrupted by user'));
    this.line(this.colors.yellow('⚠ If files appear modified or missing, check your stash to recover them'));
    this.line();
  }

  private printHeader(hook: HookUnit): void {
    const name = `[${hook.name}] `;
    const dots = '.'.repeat(Math.max(HEADER_WIDTH - hook.description.length - name.length, 0));
    this.output.write(`${hook.description}${dots}${name}`);
  }

  private printResult(status: HookStatus, output: string): void {
    switch (status) {
      case 'pass':
        this.line(this.colors.green('OK'));
        break;
      case 'warn':
        this.line(this.colors.yellow('WARNING'));
        break;
      case 'fail':
        this.line(this.colors.red('FAILED'));
        break;
      case 'interrupt':
        this.line(this.colors.red('INTERRUPTED'));
        break;
    }

    const report = output.trimEnd();
    if (report.length > 0) {
      this.line(report);
    }
  }

  private line(text = ''): void {
    this.output.write(`${text}\n`);
  }
}
