/**
 * checkpost Type Definitions
 */

import type { SubprocessResult, DetachedProcess } from '../core/subprocess/index.js';
import type { HookConfig } from '../core/config/types.js';

// Statuses

export type HookStatus = 'pass' | 'warn' | 'fail' | 'interrupt';

/** Statuses a hook implementation may produce itself */
export type ResultStatus = Exclude<HookStatus, 'interrupt'>;

export interface HookResult {
  status: HookStatus;
  output: string;
}

// Hook units

/**
 * One configured check as seen by the runner
 */
export interface HookUnit {
  readonly name: string;
  readonly description: string;
  /** Passing output is not printed */
  readonly quiet: boolean;
  isEnabled(): boolean;
  isSkipRequested(): boolean;
  isRequired(): boolean;
  wouldRun(): boolean;
  runAndTransform(signal: AbortSignal): Promise<HookResult>;
}

export interface HookLoader {
  loadHooks(): Promise<HookUnit[]>;
}

export interface EnvironmentContext {
  setupEnvironment(): Promise<void>;
  cleanupEnvironment(): Promise<void>;
}

/**
 * Observer of run and hook lifecycle events
 */
export interface ResultSink {
  startRun(): void;
  nothingToRun(): void;
  startHook(hook: HookUnit): void;
  endHook(hook: HookUnit, status: HookStatus, output: string): void;
  hookSkipped(hook: HookUnit): void;
  requiredHookNotSkipped(hook: HookUnit): void;
  runSucceeded(): void;
  runWarned(): void;
  runFailed(): void;
  runInterrupted(): void;
}

// Hook implementations

export type MessageType = 'error' | 'warning';

export interface HookMessage {
  type: MessageType;
  file?: string;
  line?: number;
  content: string;
}

export interface HookOutcome {
  status: ResultStatus;
  output?: string;
}

export type HookRunReturn = ResultStatus | HookOutcome | HookMessage[];

/**
 * What a hook implementation is given while it runs
 */
export interface HookRun {
  readonly name: string;
  readonly hookType: string;
  readonly config: HookConfig;
  readonly repoRoot: string;
  readonly signal: AbortSignal;
  /** Files the hook applies to after include/exclude filtering */
  applicableFiles(): string[];
  /** Configured command followed by configured flags */
  command(): string[];
  execute(argv: readonly string[]): Promise<SubprocessResult>;
  executeInBackground(argv: readonly string[]): Promise<DetachedProcess>;
}

export interface HookImplementation {
  name: string;
  description?: string;
  /** Configuration applied beneath the user's configuration */
  defaults?: Partial<HookConfig>;
  run(run: HookRun): Promise<HookRunReturn> | HookRunReturn;
}
