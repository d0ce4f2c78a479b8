import { HookContext, splitNulSeparated } from './base.js';
import { SetupError } from '../core/errors/index.js';

/**
 * Runs the pre-commit hooks against every tracked file without touching
 * the working tree.
 */
export class RunAllContext extends HookContext {
  readonly hookType = 'pre-commit' as const;

  protected async collectFiles(): Promise<string[]> {
    const result = await this.git(['ls-files', '-z']);
    if (result.exitCode !== 0) {
      throw new SetupError(`Unable to list tracked files: ${result.stderr.toString('utf-8').trim()}`);
    }
    return splitNulSeparated(result.stdout);
  }
}
