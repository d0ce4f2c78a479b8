/**
 * Hooks Module
 *
 * Registry of hook implementations, looked up by hook type and name.
 */

export { HookRegistry } from './registry.js';
export type { RegisteredHook } from './registry.js';
