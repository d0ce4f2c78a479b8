import { HookContext, type HookContextOptions } from './base.js';
import { PreCommitContext } from './pre-commit.js';
import { RunAllContext } from './run-all.js';
import type { HookType } from '../core/config/types.js';
import { spawn, type CommandExecutor } from '../core/subprocess/index.js';
import { ConfigError, ConfigErrorCode } from '../core/errors/index.js';

export { HookContext, PreCommitContext, RunAllContext };
export type { HookContextOptions };

export function createContext(
  hookType: HookType,
  options: HookContextOptions & { all?: boolean },
): HookContext {
  if (options.all) {
    return new RunAllContext(options);
  }
  switch (hookType) {
    case 'pre-commit':
      return new PreCommitContext(options);
  }
}

/**
 * Absolute path of the repository containing `cwd`
 */
export async function resolveRepoRoot(
  cwd: string,
  executor: CommandExecutor = spawn,
): Promise<string> {
  const result = await executor(['git', 'rev-parse', '--show-toplevel'], { cwd });
  if (result.exitCode !== 0) {
    throw new ConfigError(
      `Not inside a git repository: ${cwd}`,
      ConfigErrorCode.NOT_A_REPOSITORY,
      'Run checkpost from within a git working tree.',
    );
  }
  return result.stdout.toString('utf-8').trim();
}
