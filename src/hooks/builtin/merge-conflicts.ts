import type { HookImplementation } from '../../types/index.js';

/**
 * Checks for unresolved merge conflict markers in files about to be committed
 */
export const mergeConflicts: HookImplementation = {
  name: 'MergeConflicts',
  description: 'Check for merge conflicts',
  defaults: {
    command: ['grep'],
    flags: ['-IHn', '^<<<<<<<[ \t]'],
  },
  async run(run) {
    const files = run.applicableFiles();
    if (files.length === 0) {
      return 'pass';
    }

    const result = await run.execute([...run.command(), ...files]);
    // grep exits 1 when nothing matched
    if (result.exitCode === 1) {
      return 'pass';
    }
    if (result.exitCode !== 0) {
      return { status: 'fail', output: result.stderr.toString('utf-8').trimEnd() };
    }
    return {
      status: 'fail',
      output: `Merge conflict markers detected:\n${result.stdout.toString('utf-8').trimEnd()}`,
    };
  },
};
