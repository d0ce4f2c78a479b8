/**
 * In-process stand-ins shared by the unit tests
 */

import { EventEmitter } from 'events';
import type {
  CommandExecutor,
  DetachedExecutor,
  SpawnOptions,
  SubprocessResult,
} from '../../src/core/subprocess/index.js';
import type { LogWriter } from '../../src/utils/logger.js';

export function result(exitCode = 0, stdout = '', stderr = ''): SubprocessResult {
  return { exitCode, stdout: Buffer.from(stdout), stderr: Buffer.from(stderr) };
}

/**
 * Executor answering from a table keyed by the space-joined argument vector.
 * Unlisted commands exit 0 with no output.
 */
export class ScriptedExecutor {
  readonly calls: string[][] = [];
  readonly options: (SpawnOptions | undefined)[] = [];
  private readonly responses = new Map<string, SubprocessResult>();

  respond(command: string, response: SubprocessResult): this {
    this.responses.set(command, response);
    return this;
  }

  readonly execute: CommandExecutor = async (argv, options) => {
    this.calls.push([...argv]);
    this.options.push(options);
    return this.responses.get(argv.join(' ')) ?? result();
  };

  /** Space-joined form of every recorded call */
  commands(): string[] {
    return this.calls.map((argv) => argv.join(' '));
  }
}

export const noDetached: DetachedExecutor = async (argv) => {
  throw new Error(`unexpected background command: ${argv.join(' ')}`);
};

/** Emits signal events like `process` does */
export class FakeSignalSource extends EventEmitter {
  interrupt(signal: NodeJS.Signals = 'SIGINT'): void {
    this.emit(signal, signal);
  }
}

export class MemoryWriter implements LogWriter {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  text(): string {
    return this.chunks.join('');
  }
}
