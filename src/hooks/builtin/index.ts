import type { HookRegistry } from '../../core/hooks/registry.js';
import { eslint } from './eslint.js';
import { mergeConflicts } from './merge-conflicts.js';
import { trailingWhitespace } from './trailing-whitespace.js';

export { createCommandHook } from './command.js';
export { eslint, mergeConflicts, trailingWhitespace };

export function registerBuiltInHooks(registry: HookRegistry): HookRegistry {
  for (const implementation of [mergeConflicts, trailingWhitespace, eslint]) {
    registry.register('pre-commit', implementation);
  }
  return registry;
}
