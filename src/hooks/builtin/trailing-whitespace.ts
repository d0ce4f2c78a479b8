import type { HookImplementation } from '../../types/index.js';
import { extractMessages, outputLines } from '../messages.js';

/**
 * Checks for lines ending in whitespace
 */
export const trailingWhitespace: HookImplementation = {
  name: 'TrailingWhitespace',
  description: 'Check for trailing whitespace',
  defaults: {
    command: ['grep'],
    flags: ['-IHn', '[[:space:]]$'],
  },
  async run(run) {
    const files = run.applicableFiles();
    if (files.length === 0) {
      return 'pass';
    }

    const result = await run.execute([...run.command(), ...files]);
    if (result.stdout.length === 0) {
      return 'pass';
    }

    // example message:
    //   path/to/file.ts:12:const value = 1;
    return extractMessages(outputLines(result.stdout), /^(?<file>(?:\w:)?[^:]+):(?<line>\d+)/);
  },
};
