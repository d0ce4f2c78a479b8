/**
 * Hook context Tests
 *
 * git is replaced with a scripted executor; the tests check which commands
 * are issued and how their results are interpreted.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  PreCommitContext,
  RunAllContext,
  createContext,
  resolveRepoRoot,
} from '../../../src/context/index.js';
import { CleanupError, ConfigError, SetupError } from '../../../src/core/errors/index.js';
import { ScriptedExecutor, noDetached, result } from '../helpers.js';

const STAGED = 'git diff --cached --name-only -z --diff-filter=ACMR';
const HEAD = 'git rev-parse --verify --quiet HEAD';
const UNSTAGED = 'git diff --quiet';
const STASH = 'git stash push --keep-index --quiet --message checkpost: unstaged changes';
const RESET = 'git reset --hard --quiet';
const POP = 'git stash pop --index --quiet';

describe('PreCommitContext', () => {
  let executor: ScriptedExecutor;

  function createPreCommit(): PreCommitContext {
    return new PreCommitContext({
      repoRoot: '/repo',
      env: {},
      executor: executor.execute,
      detachedExecutor: noDetached,
    });
  }

  beforeEach(() => {
    executor = new ScriptedExecutor().respond(STAGED, result(0, 'src/a.ts\0docs/read me.md\0'));
  });

  it('should collect the staged files', async () => {
    const context = createPreCommit();

    expect(context.modifiedFiles()).toEqual([]);
    await context.setupEnvironment();

    expect(context.modifiedFiles()).toEqual(['src/a.ts', 'docs/read me.md']);
    expect(executor.options[0]?.cwd).toBe('/repo');
  });

  it('should stash unstaged changes and restore them on cleanup', async () => {
    executor.respond(UNSTAGED, result(1));
    const context = createPreCommit();

    await context.setupEnvironment();
    expect(executor.commands()).toEqual([STAGED, HEAD, UNSTAGED, STASH]);

    await context.cleanupEnvironment();
    expect(executor.commands()).toEqual([STAGED, HEAD, UNSTAGED, STASH, RESET, POP]);
  });

  it('should leave the working tree alone without unstaged changes', async () => {
    const context = createPreCommit();

    await context.setupEnvironment();
    await context.cleanupEnvironment();

    expect(executor.commands()).toEqual([STAGED, HEAD, UNSTAGED]);
  });

  it('should not stash before the first commit', async () => {
    executor.respond(HEAD, result(1)).respond(UNSTAGED, result(1));
    const context = createPreCommit();

    await context.setupEnvironment();
    await context.cleanupEnvironment();

    expect(executor.commands()).toEqual([STAGED, HEAD]);
  });

  it('should fail setup when staged files cannot be listed', async () => {
    executor.respond(STAGED, result(128, '', 'fatal: bad revision\n'));

    await expect(createPreCommit().setupEnvironment()).rejects.toThrow(
      'Unable to list staged files: fatal: bad revision',
    );
  });

  it('should fail setup when git diff reports an error', async () => {
    executor.respond(UNSTAGED, result(128));

    const pending = createPreCommit().setupEnvironment();

    await expect(pending).rejects.toBeInstanceOf(SetupError);
    await expect(pending).rejects.toThrow('Unable to check for unstaged changes: exit 128');
  });

  it('should fail setup when stashing fails', async () => {
    executor.respond(UNSTAGED, result(1)).respond(STASH, result(1, '', 'error: cannot stash\n'));

    await expect(createPreCommit().setupEnvironment()).rejects.toThrow(
      'Unable to stash unstaged changes: error: cannot stash',
    );
  });

  it('should fail cleanup when the stash cannot be popped', async () => {
    executor.respond(UNSTAGED, result(1)).respond(POP, result(1, '', 'CONFLICT (content)\n'));
    const context = createPreCommit();
    await context.setupEnvironment();

    const pending = context.cleanupEnvironment();

    await expect(pending).rejects.toBeInstanceOf(CleanupError);
    await expect(pending).rejects.toThrow(
      'Unable to restore unstaged changes (they remain in the stash as "checkpost: unstaged changes"): CONFLICT (content)',
    );
  });

  it('should not pop the stash when the reset fails', async () => {
    executor.respond(UNSTAGED, result(1)).respond(RESET, result(128, '', 'fatal: index locked\n'));
    const context = createPreCommit();
    await context.setupEnvironment();

    await expect(context.cleanupEnvironment()).rejects.toThrow('Unable to reset working tree: fatal: index locked');
    expect(executor.commands()).not.toContain(POP);
  });
});

describe('RunAllContext', () => {
  it('should collect every tracked file without touching the working tree', async () => {
    const executor = new ScriptedExecutor().respond('git ls-files -z', result(0, 'a.ts\0b.ts\0'));
    const context = new RunAllContext({ repoRoot: '/repo', executor: executor.execute });

    await context.setupEnvironment();
    await context.cleanupEnvironment();

    expect(context.modifiedFiles()).toEqual(['a.ts', 'b.ts']);
    expect(executor.commands()).toEqual(['git ls-files -z']);
  });
});

describe('createContext()', () => {
  it('should pick the context for the hook type', () => {
    expect(createContext('pre-commit', { repoRoot: '/repo' })).toBeInstanceOf(PreCommitContext);
  });

  it('should pick the run-all context when asked for all files', () => {
    const context = createContext('pre-commit', { repoRoot: '/repo', all: true });

    expect(context).toBeInstanceOf(RunAllContext);
    expect(context.hookType).toBe('pre-commit');
  });
});

describe('resolveRepoRoot()', () => {
  it('should return the top level directory', async () => {
    const executor = new ScriptedExecutor().respond('git rev-parse --show-toplevel', result(0, '/repo\n'));

    expect(await resolveRepoRoot('/repo/src', executor.execute)).toBe('/repo');
    expect(executor.options[0]?.cwd).toBe('/repo/src');
  });

  it('should fail outside a repository', async () => {
    const executor = new ScriptedExecutor().respond(
      'git rev-parse --show-toplevel',
      result(128, '', 'fatal: not a git repository\n'),
    );

    const pending = resolveRepoRoot('/tmp', executor.execute);

    await expect(pending).rejects.toBeInstanceOf(ConfigError);
    await expect(pending).rejects.toThrow('Not inside a git repository: /tmp');
  });
});
