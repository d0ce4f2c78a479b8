export { HookRunner, INTERRUPTED_OUTPUT } from './hook-runner.js';
export type { HookRunnerOptions } from './hook-runner.js';
