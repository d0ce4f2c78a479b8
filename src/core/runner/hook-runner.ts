/**
 * HookRunner
 *
 * Loads the hooks for a run and runs them in order, reporting progress to a
 * result sink.
 *
 * Loading, environment setup and cleanup happen with interrupts isolated, so
 * the repository is never left half set up. Interrupts are only delivered
 * while an individual hook runs; an interrupted hook ends the run.
 */

import type {
  EnvironmentContext,
  HookLoader,
  HookResult,
  HookStatus,
  HookUnit,
  ResultSink,
} from '../../types/index.js';
import { HookLoadError, errorMessage, isInterruptError } from '../errors/index.js';
import { InterruptHandler } from '../interrupt/handler.js';
import { Logger } from '../../utils/logger.js';

export const INTERRUPTED_OUTPUT = 'Hook was interrupted by Ctrl-C; restoring repo state...';

export interface HookRunnerOptions {
  loader: HookLoader;
  context: EnvironmentContext;
  sink: ResultSink;
  interruptHandler?: InterruptHandler;
  logger?: Logger;
  /** Hint shown when loading fails with something other than a HookLoadError */
  loadErrorHint?: string;
}

interface RunOutcome {
  failed: boolean;
  warned: boolean;
  interrupted: boolean;
}

export class HookRunner {
  private readonly loader: HookLoader;
  private readonly context: EnvironmentContext;
  private readonly sink: ResultSink;
  private readonly interrupts: InterruptHandler;
  private readonly logger: Logger;
  private readonly loadErrorHint: string;

  constructor(options: HookRunnerOptions) {
    this.loader = options.loader;
    this.context = options.context;
    this.sink = options.sink;
    this.logger = options.logger ?? Logger.silent();
    this.interrupts = options.interruptHandler ?? new InterruptHandler({ logger: this.logger });
    this.loadErrorHint = options.loadErrorHint ?? 'Did you forget to install a package? Try running `npm install`.';
  }

  /**
   * Load and run the hooks
   * @returns whether the run succeeded; warnings alone do not fail a run
   */
  async run(): Promise<boolean> {
    // Setup and cleanup are assumed to finish quickly, so they are not
    // interruptible at all.
    return this.interrupts.isolateFromInterrupts(async () => {
      // Loading comes first so a load error leaves the repository untouched
      const hooks = await this.loadHooks();

      // A failed setup may not have completed, in which case cleanup has
      // nothing reliable to undo; it is deliberately not attempted.
      await this.context.setupEnvironment();

      try {
        return await this.runHooks(hooks);
      } finally {
        await this.context.cleanupEnvironment();
      }
    });
  }

  private async loadHooks(): Promise<HookUnit[]> {
    try {
      const hooks = await this.loader.loadHooks();
      this.logger.debug(`Loaded ${hooks.length} hook(s)`);
      return hooks;
    } catch (error) {
      if (error instanceof HookLoadError) {
        throw error;
      }
      throw new HookLoadError(`A load error occurred. ${errorMessage(error)}`, this.loadErrorHint, {
        cause: error,
      });
    }
  }

  private async runHooks(hooks: HookUnit[]): Promise<boolean> {
    if (!hooks.some((hook) => hook.isEnabled())) {
      this.sink.nothingToRun();
      return true;
    }

    this.sink.startRun();

    const outcome: RunOutcome = { failed: false, warned: false, interrupted: false };

    for (const hook of hooks) {
      if (this.shouldSkip(hook)) {
        continue;
      }

      const status = await this.runHook(hook);

      if (status === 'fail') {
        outcome.failed = true;
      }
      if (status === 'warn') {
        outcome.warned = true;
      }
      if (status === 'interrupt') {
        // Stop running any more hooks and assume a bad result
        outcome.interrupted = true;
        break;
      }
    }

    this.reportResults(outcome);
    return !(outcome.failed || outcome.interrupted);
  }

  private reportResults({ failed, warned, interrupted }: RunOutcome): void {
    if (interrupted) {
      this.sink.runInterrupted();
    } else if (failed) {
      this.sink.runFailed();
    } else if (warned) {
      this.sink.runWarned();
    } else {
      this.sink.runSucceeded();
    }
  }

  private async runHook(hook: HookUnit): Promise<HookStatus> {
    this.sink.startHook(hook);

    let result: HookResult;
    try {
      // Only the hook itself may be interrupted; the runner's bookkeeping is
      // protected again as soon as it returns.
      result = await this.interrupts.disableUntilFinishedOrInterrupted((signal) =>
        hook.runAndTransform(signal),
      );
    } catch (error) {
      result = isInterruptError(error)
        ? { status: 'interrupt', output: INTERRUPTED_OUTPUT }
        : { status: 'fail', output: describeFault(error) };
    }

    this.sink.endHook(hook, result.status, result.output);
    return result.status;
  }

  private shouldSkip(hook: HookUnit): boolean {
    if (!hook.isEnabled()) {
      return true;
    }

    if (hook.isSkipRequested()) {
      if (hook.isRequired()) {
        this.sink.requiredHookNotSkipped(hook);
      } else {
        // Only mention the skip if the hook would actually have run
        if (hook.wouldRun()) {
          this.sink.hookSkipped(hook);
        }
        return true;
      }
    }

    return !hook.wouldRun();
  }
}

function describeFault(error: unknown): string {
  if (error instanceof Error) {
    return `Hook raised unexpected error\n${error.message}\n${error.stack ?? ''}`;
  }
  return `Hook raised unexpected error\n${String(error)}\n`;
}
