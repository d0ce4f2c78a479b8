import { HookContext, splitNulSeparated } from './base.js';
import { CleanupError, SetupError } from '../core/errors/index.js';
import type { SubprocessResult } from '../core/subprocess/index.js';

const STASH_MESSAGE = 'checkpost: unstaged changes';

/**
 * Context for the pre-commit hook. Hooks must only see what is about to be
 * committed, so unstaged changes are stashed for the duration of the run
 * and restored afterwards.
 */
export class PreCommitContext extends HookContext {
  readonly hookType = 'pre-commit' as const;
  private stashed = false;

  protected async collectFiles(): Promise<string[]> {
    const result = await this.git(['diff', '--cached', '--name-only', '-z', '--diff-filter=ACMR']);
    if (result.exitCode !== 0) {
      throw new SetupError(`Unable to list staged files: ${describe(result)}`);
    }
    return splitNulSeparated(result.stdout);
  }

  protected async prepareRepository(): Promise<void> {
    // Nothing to stash against before the first commit
    const head = await this.git(['rev-parse', '--verify', '--quiet', 'HEAD']);
    if (head.exitCode !== 0) {
      return;
    }

    const diff = await this.git(['diff', '--quiet']);
    if (diff.exitCode === 0) {
      return;
    }
    if (diff.exitCode !== 1) {
      throw new SetupError(`Unable to check for unstaged changes: ${describe(diff)}`);
    }

    const stash = await this.git(['stash', 'push', '--keep-index', '--quiet', '--message', STASH_MESSAGE]);
    if (stash.exitCode !== 0) {
      throw new SetupError(`Unable to stash unstaged changes: ${describe(stash)}`);
    }
    this.stashed = true;
  }

  protected async restoreRepository(): Promise<void> {
    if (!this.stashed) {
      return;
    }

    const reset = await this.git(['reset', '--hard', '--quiet']);
    if (reset.exitCode !== 0) {
      throw new CleanupError(`Unable to reset working tree: ${describe(reset)}`);
    }

    const pop = await this.git(['stash', 'pop', '--index', '--quiet']);
    if (pop.exitCode !== 0) {
      throw new CleanupError(
        `Unable to restore unstaged changes (they remain in the stash as "${STASH_MESSAGE}"): ${describe(pop)}`,
      );
    }
    this.stashed = false;
  }
}

function describe(result: SubprocessResult): string {
  const stderr = result.stderr.toString('utf-8').trim();
  return stderr.length > 0 ? stderr : `exit ${result.exitCode}`;
}
