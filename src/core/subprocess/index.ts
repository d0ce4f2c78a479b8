/**
 * Subprocess
 *
 * Runs external commands and collects their exit status and output.
 *
 * - Arguments are handed to the OS as a literal vector. Windows has no exec
 *   for scripts, so there the vector is joined and run through `cmd.exe /c`.
 * - stdout and stderr are captured separately as raw bytes, untrimmed.
 * - The exit code is returned as-is; deciding what it means is up to the
 *   caller. A command that cannot be started rejects with a SpawnError.
 */

import { spawn as spawnChild } from 'child_process';
import { once } from 'events';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { execa } from 'execa';
import { SpawnError, errorMessage } from '../errors/index.js';

export interface SubprocessResult {
  readonly exitCode: number;
  readonly stdout: Buffer;
  readonly stderr: Buffer;
}

export interface SpawnOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Aborting kills the child and rejects with the signal's reason */
  signal?: AbortSignal;
}

export interface DetachedProcess {
  readonly pid: number;
  /** Files receiving the child's output, removed once it exits */
  readonly stdoutPath: string;
  readonly stderrPath: string;
  /** Settles after the child has exited and its output files are gone */
  readonly exited: Promise<void>;
}

/**
 * Signature shared by {@link spawn} and the fakes used in tests
 */
export type CommandExecutor = (
  argv: readonly string[],
  options?: SpawnOptions,
) => Promise<SubprocessResult>;

export type DetachedExecutor = (
  argv: readonly string[],
  options?: Omit<SpawnOptions, 'signal'>,
) => Promise<DetachedProcess>;

export function isSuccess(result: SubprocessResult): boolean {
  return result.exitCode === 0;
}

/**
 * Split an argument vector into the file to execute and its arguments,
 * wrapping it in `cmd.exe /c` on Windows.
 */
export function prepareArgs(
  argv: readonly string[],
  platform: NodeJS.Platform = process.platform,
): { file: string; args: string[] } {
  const [file, ...args] = argv;
  if (file === undefined || file === '') {
    throw new TypeError('Command argument vector must not be empty');
  }

  if (platform === 'win32') {
    return { file: 'cmd.exe', args: ['/c', argv.map(quoteWindowsArg).join(' ')] };
  }

  return { file, args };
}

function quoteWindowsArg(arg: string): string {
  if (arg !== '' && !/[\s"^&|<>()%!]/.test(arg)) {
    return arg;
  }
  return `"${arg.replace(/"/g, '""')}"`;
}

/** Shell convention for processes terminated by a signal */
function exitCodeForSignal(signal: string | undefined): number | undefined {
  if (signal === undefined) {
    return undefined;
  }
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}

/**
 * Spawn a process and wait for it to exit
 */
export async function spawn(
  argv: readonly string[],
  options: SpawnOptions = {},
): Promise<SubprocessResult> {
  const { file, args } = prepareArgs(argv);

  const result = await execa(file, args, {
    cwd: options.cwd,
    env: options.env,
    signal: options.signal,
    encoding: 'buffer',
    stdin: 'ignore',
    reject: false,
    stripFinalNewline: false,
    maxBuffer: Infinity,
    windowsVerbatimArguments: process.platform === 'win32',
  });

  if (result.isCanceled) {
    options.signal?.throwIfAborted();
  }

  // With `reject: false` execa hands back its error object for failures
  // that never produced an exit status.
  const exitCode = Number.isInteger(result.exitCode)
    ? result.exitCode
    : exitCodeForSignal(result.signal);

  if (exitCode === undefined) {
    const cause = result instanceof Error ? result.message : `${file} did not exit`;
    const code = result instanceof Error ? errorCode(result) : undefined;
    throw new SpawnError(argv[0] ?? file, cause, code);
  }

  return {
    exitCode,
    stdout: toBuffer(result.stdout),
    stderr: toBuffer(result.stderr),
  };
}

/**
 * Start a process in the background and return once it is running. Its
 * output is written to temporary files that are never read back here and
 * are deleted when the child exits, or straight away if it fails to start.
 */
export async function spawnDetached(
  argv: readonly string[],
  options: Omit<SpawnOptions, 'signal'> = {},
): Promise<DetachedProcess> {
  const { file, args } = prepareArgs(argv);

  const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'checkpost-output-'));
  try {
    return await startDetached(argv, file, args, outputDir, options);
  } catch (error) {
    await fs.remove(outputDir);
    throw error;
  }
}

async function startDetached(
  argv: readonly string[],
  file: string,
  args: string[],
  outputDir: string,
  options: Omit<SpawnOptions, 'signal'>,
): Promise<DetachedProcess> {
  const stdoutPath = path.join(outputDir, 'stdout');
  const stderrPath = path.join(outputDir, 'stderr');

  // The child holds its own copies of the descriptors
  const stdoutFd = await fs.open(stdoutPath, 'w');
  try {
    const stderrFd = await fs.open(stderrPath, 'w');
    try {
      const child = spawnChild(file, args, {
        cwd: options.cwd,
        env: options.env,
        detached: true,
        stdio: ['ignore', stdoutFd, stderrFd],
        windowsHide: true,
        windowsVerbatimArguments: process.platform === 'win32',
      });
      const exit = new Promise<void>((resolve) => {
        child.once('exit', () => resolve());
      });

      try {
        await once(child, 'spawn');
      } catch (error) {
        throw new SpawnError(argv[0] ?? file, errorMessage(error), errorCode(error));
      }

      if (child.pid === undefined) {
        throw new SpawnError(argv[0] ?? file, 'no process id assigned');
      }

      child.unref();
      return {
        pid: child.pid,
        stdoutPath,
        stderrPath,
        exited: exit.then(() => removeOutput(outputDir)),
      };
    } finally {
      await fs.close(stderrFd);
    }
  } finally {
    await fs.close(stdoutFd);
  }
}

function removeOutput(outputDir: string): Promise<void> {
  return fs.remove(outputDir).catch((error: unknown) => {
    process.emitWarning(`Could not remove ${outputDir}: ${errorMessage(error)}`);
  });
}

function toBuffer(output: Buffer | undefined): Buffer {
  return output ?? Buffer.alloc(0);
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
