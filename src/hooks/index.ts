/**
 * checkpost hooks
 *
 * Hook implementations report a status, a status with output, or a list of
 * messages. ConfiguredHook turns that into the status the runner sees,
 * applying `onFail` / `onWarn` from the configuration.
 */

export * from './messages.js';
export { ConfiguredHook } from './configured-hook.js';
export { ConfiguredHookLoader } from './loader.js';
export type { ConfiguredHookLoaderOptions } from './loader.js';
export {
  createCommandHook,
  eslint,
  mergeConflicts,
  registerBuiltInHooks,
  trailingWhitespace,
} from './builtin/index.js';
