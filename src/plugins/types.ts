import { z } from 'zod';
import type { HookImplementation } from '../types/index.js';
import { HookConfigSchema } from '../core/config/types.js';

/**
 * Shape a plugin module's default export must have
 */
export const PluginHookSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  defaults: HookConfigSchema.optional(),
  run: z.custom<HookImplementation['run']>((value) => typeof value === 'function', {
    message: 'run must be a function',
  }),
});

export interface PluginHook {
  implementation: HookImplementation;
  /** File the implementation was loaded from */
  path: string;
}

/** Loads a module by absolute path */
export type ModuleImporter = (filePath: string) => Promise<unknown>;
