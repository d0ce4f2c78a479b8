/**
 * Public API for embedding checkpost and writing plugin hooks
 */

export type * from './types/index.js';
export type { HookConfig, CheckpostConfig, HookType } from './core/config/types.js';
export { loadConfig, getDefaultConfig, mergeConfigs, resolveHookConfig } from './core/config/loader.js';
export * from './core/errors/index.js';
export { HookRegistry } from './core/hooks/index.js';
export { InterruptHandler } from './core/interrupt/index.js';
export { HookRunner } from './core/runner/index.js';
export { spawn, spawnDetached, isSuccess } from './core/subprocess/index.js';
export type { SubprocessResult, SpawnOptions, DetachedProcess } from './core/subprocess/index.js';
export { createContext, PreCommitContext, RunAllContext, HookContext } from './context/index.js';
export { ConfiguredHook, ConfiguredHookLoader, extractMessages } from './hooks/index.js';
export { Printer } from './cli/printer.js';
export { Logger } from './utils/logger.js';
