import type { HookImplementation } from '../../types/index.js';
import { isSuccess } from '../../core/subprocess/index.js';

/**
 * Hook for a configured name with no implementation of its own: runs the
 * configured command and passes when it exits 0.
 */
export function createCommandHook(name: string): HookImplementation {
  return {
    name,
    async run(run) {
      const argv = run.command();
      if (argv.length === 0) {
        throw new Error(`Hook ${name} has no command configured`);
      }

      const files = run.config.passFiles ? run.applicableFiles() : [];
      const result = await run.execute([...argv, ...files]);
      if (isSuccess(result)) {
        return 'pass';
      }

      const output = [result.stdout.toString('utf-8').trimEnd(), result.stderr.toString('utf-8').trimEnd()]
        .filter((text) => text.length > 0)
        .join('\n');
      return { status: 'fail', output };
    },
  };
}
