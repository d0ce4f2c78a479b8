/**
 * HookRegistry
 *
 * Hook implementations keyed by hook type and name. Registering a name that
 * already exists replaces the earlier implementation, which is how plugin
 * hooks override built-in ones.
 */

import type { HookImplementation } from '../../types/index.js';

export interface RegisteredHook {
  implementation: HookImplementation;
  /** Where the implementation came from, e.g. "built-in" or a plugin path */
  source: string;
}

export class HookRegistry {
  private readonly hooks: Map<string, Map<string, RegisteredHook>> = new Map();

  /**
   * Register an implementation for a hook type
   * @returns the implementation it replaced, if any
   */
  register(
    hookType: string,
    implementation: HookImplementation,
    source = 'built-in',
  ): RegisteredHook | undefined {
    const forType = this.hooks.get(hookType) ?? new Map<string, RegisteredHook>();
    const previous = forType.get(implementation.name);
    forType.set(implementation.name, { implementation, source });
    this.hooks.set(hookType, forType);
    return previous;
  }

  get(hookType: string, name: string): RegisteredHook | undefined {
    return this.hooks.get(hookType)?.get(name);
  }
}
