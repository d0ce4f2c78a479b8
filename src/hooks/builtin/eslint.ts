import { z } from 'zod';
import type { HookImplementation, HookMessage } from '../../types/index.js';

const EslintReportSchema = z.array(
  z.object({
    filePath: z.string(),
    messages: z.array(
      z.object({
        line: z.number().optional(),
        column: z.number().optional(),
        severity: z.number(),
        message: z.string(),
        ruleId: z.string().nullable().optional(),
      }),
    ),
  }),
);

/**
 * Runs ESLint against modified JavaScript and TypeScript files
 *
 * ESLint exits 0 when clean (warnings included), 1 when errors were found
 * and 2 on configuration or internal errors.
 */
export const eslint: HookImplementation = {
  name: 'Eslint',
  description: 'Analyze with ESLint',
  defaults: {
    command: ['eslint'],
    flags: ['--format=json'],
    include: ['**/*.{js,jsx,mjs,cjs,ts,tsx,mts,cts}'],
    requiredExecutable: 'eslint',
    installCommand: 'npm install --save-dev eslint',
  },
  async run(run) {
    const files = run.applicableFiles();
    if (files.length === 0) {
      return 'pass';
    }

    const result = await run.execute([...run.command(), ...files]);
    if (result.exitCode === 2) {
      return { status: 'fail', output: result.stderr.toString('utf-8').trimEnd() };
    }

    const report = EslintReportSchema.parse(JSON.parse(result.stdout.toString('utf-8')));
    const messages: HookMessage[] = [];
    for (const file of report) {
      for (const message of file.messages) {
        const rule = message.ruleId ? ` (${message.ruleId})` : '';
        const location = message.line !== undefined ? `:${message.line}:${message.column ?? 0}` : '';
        messages.push({
          type: message.severity >= 2 ? 'error' : 'warning',
          file: file.filePath,
          line: message.line,
          content: `${file.filePath}${location}: ${message.message}${rule}`,
        });
      }
    }
    return messages;
  },
};
