import fs from 'fs-extra';
import path from 'path';
import {
  ALL_HOOKS_KEY,
  CheckpostConfigSchema,
  SUPPORTED_HOOK_TYPES,
  type CheckpostConfig,
  type CheckpostConfigInput,
  type HookConfig,
  type HookType,
} from './types.js';
import { ConfigError, ConfigErrorCode, errorMessage } from '../errors/index.js';

export const CONFIG_FILE_NAME = '.checkpost.json';

/**
 * Load the repository configuration merged over the defaults
 *
 * Loading order (priority):
 * 1. Defaults (built-in hooks)
 * 2. Repository config (<repo>/.checkpost.json) - overrides defaults
 */
export async function loadConfig(
  options: { cwd?: string; configPath?: string } = {},
): Promise<CheckpostConfig> {
  const cwd = options.cwd || process.cwd();
  const configPath = options.configPath ?? path.join(cwd, CONFIG_FILE_NAME);

  const repoConfig = await readConfigFile(configPath);
  return repoConfig ? mergeConfigs(getDefaultConfig(), repoConfig) : getDefaultConfig();
}

/**
 * Get the default configuration
 */
export function getDefaultConfig(): CheckpostConfig {
  return {
    pluginDirectory: '.checkpost/hooks',
    hooks: {
      'pre-commit': {
        [ALL_HOOKS_KEY]: {},
        MergeConflicts: { enabled: true, quiet: true },
        TrailingWhitespace: { enabled: false },
        Eslint: { enabled: false },
      },
    },
  };
}

/**
 * Merge a repository configuration over a base configuration
 * - pluginDirectory: override
 * - hooks: merged per hook type, then per hook name (shallow)
 */
export function mergeConfigs(base: CheckpostConfig, local: CheckpostConfigInput): CheckpostConfig {
  const hooks: Record<string, Record<string, HookConfig>> = { ...base.hooks };

  for (const [hookType, localHooks] of Object.entries(local.hooks ?? {})) {
    const merged: Record<string, HookConfig> = { ...(hooks[hookType] ?? {}) };
    for (const [name, hookConfig] of Object.entries(localHooks)) {
      merged[name] = { ...(merged[name] ?? {}), ...hookConfig };
    }
    hooks[hookType] = merged;
  }

  return {
    pluginDirectory: local.pluginDirectory ?? base.pluginDirectory,
    hooks,
  };
}

export function assertHookType(hookType: string): HookType {
  const supported: readonly string[] = SUPPORTED_HOOK_TYPES;
  const match = SUPPORTED_HOOK_TYPES.find((candidate) => candidate === hookType);
  if (!match) {
    throw new ConfigError(
      `Unsupported hook type: "${hookType}"`,
      ConfigErrorCode.UNKNOWN_HOOK_TYPE,
      `Supported hook types: ${supported.join(', ')}`,
    );
  }
  return match;
}

/**
 * Names of the hooks configured for a hook type, in configuration order
 */
export function configuredHookNames(config: CheckpostConfig, hookType: string): string[] {
  return Object.keys(config.hooks[hookType] ?? {}).filter((name) => name !== ALL_HOOKS_KEY);
}

/**
 * Effective settings for one hook: implementation defaults, then `ALL`,
 * then the hook's own entry.
 */
export function resolveHookConfig(
  config: CheckpostConfig,
  hookType: string,
  name: string,
  defaults: Partial<HookConfig> = {},
): HookConfig {
  const hooksForType = config.hooks[hookType] ?? {};
  return {
    ...defaults,
    ...(hooksForType[ALL_HOOKS_KEY] ?? {}),
    ...(hooksForType[name] ?? {}),
  };
}

// Helper functions

async function readConfigFile(filePath: string): Promise<CheckpostConfigInput | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new ConfigError(
      `Unable to read config file: ${filePath}`,
      ConfigErrorCode.UNREADABLE_FILE,
      errorMessage(error),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in config file: ${filePath}`,
      ConfigErrorCode.INVALID_JSON,
      `Check the configuration file syntax. ${errorMessage(error)}`,
    );
  }

  const result = CheckpostConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(
      `Invalid configuration in ${filePath} at ${location}`,
      ConfigErrorCode.INVALID_SCHEMA,
      issue?.message,
    );
  }

  return result.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
