/**
 * ConfiguredHook
 *
 * Binds a hook implementation to its effective configuration and the run's
 * context, and exposes the result as a HookUnit for the runner.
 */

import { minimatch } from 'minimatch';
import type {
  HookImplementation,
  HookResult,
  HookRun,
  HookRunReturn,
  HookStatus,
  HookUnit,
  ResultStatus,
} from '../types/index.js';
import type { HookConfig } from '../core/config/types.js';
import type { HookContext } from '../context/base.js';
import { findExecutable, parseNameList } from '../utils/index.js';
import { formatMessages, statusForMessages } from './messages.js';

export class ConfiguredHook implements HookUnit {
  readonly name: string;
  readonly description: string;
  readonly quiet: boolean;

  constructor(
    private readonly implementation: HookImplementation,
    readonly config: HookConfig,
    private readonly context: HookContext,
  ) {
    this.name = implementation.name;
    this.description = config.description ?? implementation.description ?? `Run ${implementation.name}`;
    this.quiet = config.quiet === true;
  }

  isEnabled(): boolean {
    return this.config.enabled !== false;
  }

  isRequired(): boolean {
    return this.config.required === true;
  }

  /**
   * Skipped through configuration or the SKIP variable, e.g.
   * `SKIP=Eslint,TrailingWhitespace git commit`
   */
  isSkipRequested(): boolean {
    if (this.config.skip === true) {
      return true;
    }
    const requested = parseNameList(this.context.env.SKIP).map((name) => name.toLowerCase());
    return requested.includes('all') || requested.includes(this.name.toLowerCase());
  }

  /**
   * Hooks restricted to certain files only run when such files are in scope
   */
  wouldRun(): boolean {
    if (!this.isEnabled()) {
      return false;
    }
    if (this.config.include === undefined) {
      return true;
    }
    return this.applicableFiles().length > 0;
  }

  applicableFiles(): string[] {
    const include = this.config.include;
    const exclude = this.config.exclude ?? [];
    return this.context.modifiedFiles().filter(
      (file) =>
        (include === undefined || include.some((pattern) => minimatch(file, pattern, { dot: true }))) &&
        !exclude.some((pattern) => minimatch(file, pattern, { dot: true })),
    );
  }

  async runAndTransform(signal: AbortSignal): Promise<HookResult> {
    const missing = await this.checkRequiredExecutable();
    if (missing) {
      return { status: 'fail', output: missing };
    }

    const returned = await this.implementation.run(this.createRun(signal));
    const { status, output } = this.processReturn(returned);
    return { status: this.transformStatus(status), output };
  }

  private createRun(signal: AbortSignal): HookRun {
    const { context, config } = this;
    return {
      name: this.name,
      hookType: context.hookType,
      config,
      repoRoot: context.repoRoot,
      signal,
      applicableFiles: () => this.applicableFiles(),
      command: () => [...(config.command ?? []), ...(config.flags ?? [])],
      execute: (argv) => context.executor(argv, { cwd: context.repoRoot, env: context.env, signal }),
      executeInBackground: (argv) =>
        context.detachedExecutor(argv, { cwd: context.repoRoot, env: context.env }),
    };
  }

  private async checkRequiredExecutable(): Promise<string | null> {
    const executable = this.config.requiredExecutable;
    if (!executable) {
      return null;
    }
    if (await findExecutable(executable, this.context.env, this.context.repoRoot)) {
      return null;
    }

    let message = `'${executable}' is not installed (or is not in your PATH)`;
    if (this.config.installCommand) {
      message += `\nInstall it by running: ${this.config.installCommand}`;
    }
    return message;
  }

  private processReturn(returned: HookRunReturn): { status: ResultStatus; output: string } {
    if (Array.isArray(returned)) {
      return { status: statusForMessages(returned), output: formatMessages(returned) };
    }
    if (typeof returned === 'string') {
      return { status: this.assertStatus(returned), output: '' };
    }
    return { status: this.assertStatus(returned.status), output: returned.output ?? '' };
  }

  // Plugin hooks are plain JavaScript, so their statuses are checked here
  private assertStatus(status: unknown): ResultStatus {
    if (status === 'pass' || status === 'warn' || status === 'fail') {
      return status;
    }
    throw new Error(`Hook returned unknown status '${String(status)}'; expected one of pass, warn, fail`);
  }

  private transformStatus(status: ResultStatus): HookStatus {
    switch (status) {
      case 'fail':
        return this.config.onFail ?? 'fail';
      case 'warn':
        return this.config.onWarn ?? 'warn';
      case 'pass':
        return 'pass';
    }
  }
}
