import path from 'path';
import type { EnvironmentContext } from '../types/index.js';
import type { HookType } from '../core/config/types.js';
import {
  spawn,
  spawnDetached,
  type CommandExecutor,
  type DetachedExecutor,
  type SubprocessResult,
} from '../core/subprocess/index.js';
import { Logger } from '../utils/logger.js';

export interface HookContextOptions {
  repoRoot: string;
  env?: NodeJS.ProcessEnv;
  executor?: CommandExecutor;
  detachedExecutor?: DetachedExecutor;
  logger?: Logger;
}

/**
 * State shared by all hooks of one run: the repository, the environment
 * the hooks see and the files they apply to.
 */
export abstract class HookContext implements EnvironmentContext {
  abstract readonly hookType: HookType;

  readonly repoRoot: string;
  readonly env: NodeJS.ProcessEnv;
  readonly executor: CommandExecutor;
  readonly detachedExecutor: DetachedExecutor;
  protected readonly logger: Logger;
  private files: string[] = [];

  constructor(options: HookContextOptions) {
    this.repoRoot = path.resolve(options.repoRoot);
    this.env = options.env ?? process.env;
    this.executor = options.executor ?? spawn;
    this.detachedExecutor = options.detachedExecutor ?? spawnDetached;
    this.logger = options.logger ?? Logger.silent();
  }

  /**
   * Files the hooks of this run apply to, relative to the repository root.
   * Empty until the environment has been set up.
   */
  modifiedFiles(): string[] {
    return [...this.files];
  }

  async setupEnvironment(): Promise<void> {
    this.files = await this.collectFiles();
    this.logger.debug(`${this.files.length} file(s) in scope`);
    await this.prepareRepository();
  }

  async cleanupEnvironment(): Promise<void> {
    await this.restoreRepository();
  }

  protected abstract collectFiles(): Promise<string[]>;

  protected async prepareRepository(): Promise<void> {}

  protected async restoreRepository(): Promise<void> {}

  protected git(args: string[]): Promise<SubprocessResult> {
    this.logger.debug(`git ${args.join(' ')}`);
    return this.executor(['git', ...args], { cwd: this.repoRoot, env: this.env });
  }
}

/** Split NUL-separated git output into paths */
export function splitNulSeparated(output: Buffer): string[] {
  return output
    .toString('utf-8')
    .split('\0')
    .filter((entry) => entry.length > 0);
}
