/**
 * Built-in hook implementations
 *
 * Each hook is given a scripted HookRun, so no external tool is needed.
 */

import { describe, it, expect } from 'vitest';
import {
  createCommandHook,
  eslint,
  mergeConflicts,
  trailingWhitespace,
} from '../../../src/hooks/builtin/index.js';
import type { HookConfig } from '../../../src/core/config/types.js';
import type { HookImplementation, HookRun, HookRunReturn } from '../../../src/types/index.js';
import { ScriptedExecutor, noDetached, result } from '../helpers.js';

interface ScriptedRun {
  run: HookRun;
  executor: ScriptedExecutor;
}

function scriptedRun(
  implementation: HookImplementation,
  files: string[],
  config: HookConfig = {},
): ScriptedRun {
  const executor = new ScriptedExecutor();
  const effective: HookConfig = { ...implementation.defaults, ...config };
  const signal = new AbortController().signal;
  const run: HookRun = {
    name: implementation.name,
    hookType: 'pre-commit',
    config: effective,
    repoRoot: '/repo',
    signal,
    applicableFiles: () => files,
    command: () => [...(effective.command ?? []), ...(effective.flags ?? [])],
    execute: (argv) => executor.execute(argv, { cwd: '/repo', signal }),
    executeInBackground: (argv) => noDetached(argv),
  };
  return { run, executor };
}

async function invoke(implementation: HookImplementation, run: HookRun): Promise<HookRunReturn> {
  return implementation.run(run);
}

describe('MergeConflicts', () => {
  const grep = 'grep -IHn ^<<<<<<<[ \t] src/a.ts src/b.ts';

  it('should pass without running grep when there are no files', async () => {
    const { run, executor } = scriptedRun(mergeConflicts, []);

    expect(await invoke(mergeConflicts, run)).toBe('pass');
    expect(executor.calls).toEqual([]);
  });

  it('should pass when grep finds nothing', async () => {
    const { run, executor } = scriptedRun(mergeConflicts, ['src/a.ts', 'src/b.ts']);
    executor.respond(grep, result(1));

    expect(await invoke(mergeConflicts, run)).toBe('pass');
    expect(executor.commands()).toEqual([grep]);
  });

  it('should fail listing the conflict markers', async () => {
    const { run, executor } = scriptedRun(mergeConflicts, ['src/a.ts', 'src/b.ts']);
    executor.respond(grep, result(0, 'src/a.ts:3:<<<<<<< HEAD\n'));

    expect(await invoke(mergeConflicts, run)).toEqual({
      status: 'fail',
      output: 'Merge conflict markers detected:\nsrc/a.ts:3:<<<<<<< HEAD',
    });
  });

  it('should fail with the error output when grep itself fails', async () => {
    const { run, executor } = scriptedRun(mergeConflicts, ['src/a.ts', 'src/b.ts']);
    executor.respond(grep, result(2, '', 'grep: src/b.ts: Permission denied\n'));

    expect(await invoke(mergeConflicts, run)).toEqual({
      status: 'fail',
      output: 'grep: src/b.ts: Permission denied',
    });
  });
});

describe('TrailingWhitespace', () => {
  const grep = 'grep -IHn [[:space:]]$ src/a.ts README.md';

  it('should pass when no line matches', async () => {
    const { run, executor } = scriptedRun(trailingWhitespace, ['src/a.ts', 'README.md']);
    executor.respond(grep, result(1));

    expect(await invoke(trailingWhitespace, run)).toBe('pass');
  });

  it('should report each offending line as an error', async () => {
    const { run, executor } = scriptedRun(trailingWhitespace, ['src/a.ts', 'README.md']);
    executor.respond(grep, result(0, 'src/a.ts:4:const a = 1; \nREADME.md:10:Usage:  \n'));

    expect(await invoke(trailingWhitespace, run)).toEqual([
      { type: 'error', file: 'src/a.ts', line: 4, content: 'src/a.ts:4:const a = 1; ' },
      { type: 'error', file: 'README.md', line: 10, content: 'README.md:10:Usage:  ' },
    ]);
  });

  it('should throw on output it does not understand', async () => {
    const { run, executor } = scriptedRun(trailingWhitespace, ['src/a.ts', 'README.md']);
    executor.respond(grep, result(2, 'grep: warning: recursive search of stdin\n'));

    await expect(invoke(trailingWhitespace, run)).rejects.toThrow(/^Unexpected output/);
  });
});

describe('Eslint', () => {
  const command = 'eslint --format=json src/a.ts';

  it('should only apply to script files by default', () => {
    expect(eslint.defaults?.include).toEqual(['**/*.{js,jsx,mjs,cjs,ts,tsx,mts,cts}']);
    expect(eslint.defaults?.requiredExecutable).toBe('eslint');
  });

  it('should turn the JSON report into messages', async () => {
    const { run, executor } = scriptedRun(eslint, ['src/a.ts']);
    const report = [
      {
        filePath: '/repo/src/a.ts',
        messages: [
          { line: 2, column: 7, severity: 2, message: "'x' is not defined.", ruleId: 'no-undef' },
          { line: 5, column: 1, severity: 1, message: 'Unexpected console statement.', ruleId: 'no-console' },
          { severity: 1, message: 'File ignored by default.', ruleId: null },
        ],
      },
    ];
    executor.respond(command, result(1, JSON.stringify(report)));

    expect(await invoke(eslint, run)).toEqual([
      {
        type: 'error',
        file: '/repo/src/a.ts',
        line: 2,
        content: "/repo/src/a.ts:2:7: 'x' is not defined. (no-undef)",
      },
      {
        type: 'warning',
        file: '/repo/src/a.ts',
        line: 5,
        content: '/repo/src/a.ts:5:1: Unexpected console statement. (no-console)',
      },
      {
        type: 'warning',
        file: '/repo/src/a.ts',
        line: undefined,
        content: '/repo/src/a.ts: File ignored by default.',
      },
    ]);
  });

  it('should fail with the error output when ESLint cannot run', async () => {
    const { run, executor } = scriptedRun(eslint, ['src/a.ts']);
    executor.respond(command, result(2, '', 'Oops! Something went wrong!\n'));

    expect(await invoke(eslint, run)).toEqual({ status: 'fail', output: 'Oops! Something went wrong!' });
  });

  it('should pass a clean report', async () => {
    const { run, executor } = scriptedRun(eslint, ['src/a.ts']);
    executor.respond(command, result(0, JSON.stringify([{ filePath: '/repo/src/a.ts', messages: [] }])));

    expect(await invoke(eslint, run)).toEqual([]);
  });
});

describe('createCommandHook()', () => {
  it('should pass when the command exits 0', async () => {
    const hook = createCommandHook('Typecheck');
    const { run, executor } = scriptedRun(hook, ['src/a.ts'], { command: ['tsc', '--noEmit'] });

    expect(await invoke(hook, run)).toBe('pass');
    expect(executor.commands()).toEqual(['tsc --noEmit']);
  });

  it('should append applicable files when passFiles is set', async () => {
    const hook = createCommandHook('Prettier');
    const { run, executor } = scriptedRun(hook, ['src/a.ts', 'src/b.ts'], {
      command: ['prettier'],
      flags: ['--check'],
      passFiles: true,
    });

    await invoke(hook, run);

    expect(executor.commands()).toEqual(['prettier --check src/a.ts src/b.ts']);
  });

  it('should fail with both output streams', async () => {
    const hook = createCommandHook('Typecheck');
    const { run, executor } = scriptedRun(hook, [], { command: ['tsc'] });
    executor.respond('tsc', result(2, 'src/a.ts(1,1): error TS1005\n', 'exited with errors\n'));

    expect(await invoke(hook, run)).toEqual({
      status: 'fail',
      output: 'src/a.ts(1,1): error TS1005\nexited with errors',
    });
  });

  it('should throw without a command', async () => {
    const hook = createCommandHook('Empty');
    const { run } = scriptedRun(hook, []);

    await expect(invoke(hook, run)).rejects.toThrow('Hook Empty has no command configured');
  });
});
