/**
 * InterruptHandler
 *
 * Scoped control over how SIGINT is treated while hooks run.
 *
 * - isolateFromInterrupts(): interrupts are swallowed for the whole section.
 * - disableUntilFinishedOrInterrupted(): interrupts are delivered to the
 *   wrapped call through an AbortSignal; once the call has settled the
 *   section rejects with an InterruptError.
 *
 * Sections nest; the innermost decides what an interrupt does. The process
 * listener exists only while at least one section is open.
 */

import { InterruptError, errorMessage } from '../errors/index.js';
import { Logger } from '../../utils/logger.js';

/** Anything that emits signal events, normally `process` */
export interface InterruptSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface InterruptHandlerOptions {
  source?: InterruptSource;
  signals?: NodeJS.Signals[];
  logger?: Logger;
}

type Section =
  | { mode: 'isolated' }
  | { mode: 'deliver'; controller: AbortController };

export class InterruptHandler {
  private readonly sections: Section[] = [];
  private readonly source: InterruptSource;
  private readonly signals: NodeJS.Signals[];
  private readonly logger: Logger;
  private readonly listener = (signal: NodeJS.Signals): void => {
    this.handleInterrupt(signal);
  };

  constructor(options: InterruptHandlerOptions = {}) {
    this.source = options.source ?? process;
    this.signals = options.signals ?? ['SIGINT'];
    this.logger = options.logger ?? Logger.silent();
  }

  /**
   * Run `fn` with interrupts ignored. Nothing received meanwhile is replayed
   * afterwards.
   */
  async isolateFromInterrupts<T>(fn: () => Promise<T>): Promise<T> {
    const section: Section = { mode: 'isolated' };
    this.enter(section);
    try {
      return await fn();
    } finally {
      this.leave(section);
    }
  }

  /**
   * Run `fn` with interrupts delivered to it. On interrupt the signal passed
   * to `fn` is aborted; the section stays open until `fn` settles and then
   * rejects with the InterruptError, whatever `fn` produced.
   */
  async disableUntilFinishedOrInterrupted<T>(
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const section: Section = { mode: 'deliver', controller };
    this.enter(section);
    try {
      return await this.settleThenRaise(fn, controller.signal);
    } finally {
      this.leave(section);
    }
  }

  private async settleThenRaise<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal,
  ): Promise<T> {
    try {
      const value = await fn(signal);
      signal.throwIfAborted();
      return value;
    } catch (error) {
      if (signal.aborted && error !== signal.reason) {
        this.logger.debug(`Interrupted hook settled with: ${errorMessage(error)}`);
        throw signal.reason;
      }
      throw error;
    }
  }

  private enter(section: Section): void {
    if (this.sections.length === 0) {
      for (const signal of this.signals) {
        this.source.on(signal, this.listener);
      }
    }
    this.sections.push(section);
  }

  private leave(section: Section): void {
    const index = this.sections.lastIndexOf(section);
    if (index !== -1) {
      this.sections.splice(index, 1);
    }
    if (this.sections.length === 0) {
      for (const signal of this.signals) {
        this.source.off(signal, this.listener);
      }
    }
  }

  private handleInterrupt(signal: NodeJS.Signals): void {
    const current = this.sections[this.sections.length - 1];
    if (current === undefined) {
      return;
    }

    if (current.mode === 'isolated') {
      this.logger.debug(`Ignoring ${signal} until the current step completes`);
      return;
    }

    if (current.controller.signal.aborted) {
      this.logger.debug(`Ignoring repeated ${signal}`);
      return;
    }

    this.logger.debug(`Delivering ${signal} to running hook`);
    current.controller.abort(new InterruptError(signal));
  }
}
