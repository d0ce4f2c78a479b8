export enum ConfigErrorCode {
  INVALID_JSON = 'INVALID_JSON',
  INVALID_SCHEMA = 'INVALID_SCHEMA',
  UNREADABLE_FILE = 'UNREADABLE_FILE',
  UNKNOWN_HOOK_TYPE = 'UNKNOWN_HOOK_TYPE',
  NOT_A_REPOSITORY = 'NOT_A_REPOSITORY',
}

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: ConfigErrorCode, suggestion?: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.suggestion = suggestion;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Raised when hooks cannot be loaded. Always raised before the repository
 * has been touched.
 */
export class HookLoadError extends Error {
  public readonly hint: string;

  constructor(message: string, hint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HookLoadError';
    this.hint = hint;
    Object.setPrototypeOf(this, HookLoadError.prototype);
  }
}

/**
 * Cancellation raised when the user interrupts a running hook. Travels as the
 * reason of an aborted AbortSignal, never as a fault.
 */
export class InterruptError extends Error {
  public readonly signal: NodeJS.Signals;

  constructor(signal: NodeJS.Signals = 'SIGINT') {
    super(`Interrupted by ${signal}`);
    this.name = 'InterruptError';
    this.signal = signal;
    Object.setPrototypeOf(this, InterruptError.prototype);
  }
}

export class SpawnError extends Error {
  public readonly command: string;
  /** OS error code, e.g. ENOENT or EACCES */
  public readonly code?: string;

  constructor(command: string, message: string, code?: string) {
    super(`Unable to start '${command}': ${message}`);
    this.name = 'SpawnError';
    this.command = command;
    this.code = code;
    Object.setPrototypeOf(this, SpawnError.prototype);
  }
}

export class SetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SetupError';
    Object.setPrototypeOf(this, SetupError.prototype);
  }
}

export class CleanupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CleanupError';
    Object.setPrototypeOf(this, CleanupError.prototype);
  }
}

export function isInterruptError(error: unknown): error is InterruptError {
  return error instanceof InterruptError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
