/**
 * ConfiguredHookLoader
 *
 * Produces the ordered hook units for a run: built-in implementations,
 * overridden or extended by plugin hooks, bound to their configuration.
 */

import path from 'path';
import type { HookLoader, HookUnit } from '../types/index.js';
import type { CheckpostConfig } from '../core/config/types.js';
import { CONFIG_FILE_NAME, configuredHookNames, resolveHookConfig } from '../core/config/loader.js';
import { HookRegistry } from '../core/hooks/registry.js';
import { HookLoadError } from '../core/errors/index.js';
import type { HookContext } from '../context/base.js';
import { discoverPluginHooks, importModule } from '../plugins/loader.js';
import type { ModuleImporter } from '../plugins/types.js';
import { Logger } from '../utils/logger.js';
import { ConfiguredHook } from './configured-hook.js';
import { createCommandHook, registerBuiltInHooks } from './builtin/index.js';

export interface ConfiguredHookLoaderOptions {
  config: CheckpostConfig;
  context: HookContext;
  registry?: HookRegistry;
  importer?: ModuleImporter;
  logger?: Logger;
}

export class ConfiguredHookLoader implements HookLoader {
  private readonly config: CheckpostConfig;
  private readonly context: HookContext;
  private readonly registry: HookRegistry;
  private readonly importer: ModuleImporter;
  private readonly logger: Logger;

  constructor(options: ConfiguredHookLoaderOptions) {
    this.config = options.config;
    this.context = options.context;
    this.registry = options.registry ?? registerBuiltInHooks(new HookRegistry());
    this.importer = options.importer ?? importModule;
    this.logger = options.logger ?? Logger.silent();
  }

  /**
   * Hooks in configuration order, followed by plugin hooks that have no
   * configuration entry
   */
  async loadHooks(): Promise<HookUnit[]> {
    const hookType = this.context.hookType;
    const pluginRoot = path.resolve(this.context.repoRoot, this.config.pluginDirectory);
    const plugins = await discoverPluginHooks(pluginRoot, hookType, this.importer);

    for (const plugin of plugins) {
      const replaced = this.registry.register(hookType, plugin.implementation, plugin.path);
      if (replaced) {
        this.logger.debug(
          `Plugin ${plugin.path} overrides ${replaced.source} hook ${plugin.implementation.name}`,
        );
      }
    }

    const names = configuredHookNames(this.config, hookType);
    for (const plugin of plugins) {
      if (!names.includes(plugin.implementation.name)) {
        names.push(plugin.implementation.name);
      }
    }

    return names.map((name) => this.createHook(name));
  }

  private createHook(name: string): HookUnit {
    const hookType = this.context.hookType;
    const registered = this.registry.get(hookType, name);
    const hookConfig = resolveHookConfig(
      this.config,
      hookType,
      name,
      registered?.implementation.defaults,
    );

    if (registered) {
      return new ConfiguredHook(registered.implementation, hookConfig, this.context);
    }
    if (hookConfig.command) {
      return new ConfiguredHook(createCommandHook(name), hookConfig, this.context);
    }

    throw new HookLoadError(
      `Unknown ${hookType} hook '${name}'`,
      `Give it a "command" in ${CONFIG_FILE_NAME}, or add a plugin named ${name} to ${path.join(this.config.pluginDirectory, hookType)}.`,
    );
  }
}
