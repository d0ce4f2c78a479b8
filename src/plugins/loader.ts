// src/plugins/loader.ts

import path from 'path';
import { pathToFileURL } from 'url';
import fs from 'fs-extra';
import { PluginHookSchema, type ModuleImporter, type PluginHook } from './types.js';
import { HookLoadError, errorMessage } from '../core/errors/index.js';

const PLUGIN_EXTENSIONS = ['.js', '.mjs'];

export const importModule: ModuleImporter = (filePath) => import(pathToFileURL(filePath).href);

/**
 * Discovers plugin hooks for a hook type
 *
 * Plugins live in `<pluginRoot>/<hook-type>/`, one hook per `.js` or `.mjs`
 * file, loaded in file name order.
 */
export async function discoverPluginHooks(
  pluginRoot: string,
  hookType: string,
  importer: ModuleImporter = importModule,
): Promise<PluginHook[]> {
  const hookDir = path.join(pluginRoot, hookType);
  const isDirectory = await fs
    .stat(hookDir)
    .then((stats) => stats.isDirectory())
    .catch(() => false);
  if (!isDirectory) {
    return [];
  }

  const entries = await fs.readdir(hookDir);
  const files = entries.filter((file) => PLUGIN_EXTENSIONS.includes(path.extname(file))).sort();

  const plugins: PluginHook[] = [];
  for (const file of files) {
    plugins.push(await loadPluginHook(path.join(hookDir, file), importer));
  }
  return plugins;
}

/**
 * Imports and validates a single plugin hook
 */
export async function loadPluginHook(
  filePath: string,
  importer: ModuleImporter = importModule,
): Promise<PluginHook> {
  let loaded: unknown;
  try {
    loaded = await importer(filePath);
  } catch (error) {
    throw new HookLoadError(
      `Unable to load plugin hook ${filePath}: ${errorMessage(error)}`,
      isModuleNotFound(error)
        ? 'Did you forget to install a package the plugin depends on? Try running `npm install`.'
        : 'Check the plugin file for syntax errors.',
      { cause: error },
    );
  }

  const result = PluginHookSchema.safeParse(exportedHook(loaded));
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new HookLoadError(
      `Plugin ${filePath} does not export a valid hook (${field}${issue?.message ?? 'invalid export'})`,
      'Export a default object with a "name" string and a "run" function.',
    );
  }

  return { implementation: result.data, path: filePath };
}

function exportedHook(loaded: unknown): unknown {
  if (typeof loaded !== 'object' || loaded === null) {
    return undefined;
  }
  if ('default' in loaded) {
    return loaded.default;
  }
  return 'hook' in loaded ? loaded.hook : undefined;
}

function isModuleNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ERR_MODULE_NOT_FOUND' || error.code === 'MODULE_NOT_FOUND')
  );
}
