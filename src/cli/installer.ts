/**
 * Installs checkpost as a git hook script
 */

import path from 'path';
import fs from 'fs-extra';
import { spawn, type CommandExecutor } from '../core/subprocess/index.js';
import { ConfigError, ConfigErrorCode } from '../core/errors/index.js';

/** Marks hook scripts written by checkpost */
export const HOOK_SIGNATURE = '# checkpost managed hook';

const BACKUP_SUFFIX = '.checkpost-backup';

export type InstallStatus = 'installed' | 'updated' | 'exists';

export interface InstallResult {
  status: InstallStatus;
  hookPath: string;
  /** Where a pre-existing foreign hook was moved */
  backupPath?: string;
}

export type UninstallStatus = 'removed' | 'restored' | 'not-installed' | 'foreign';

export interface UninstallResult {
  status: UninstallStatus;
  hookPath: string;
}

export function hookScript(hookType: string): string {
  return [
    '#!/bin/sh',
    HOOK_SIGNATURE,
    `exec npx --no-install checkpost run ${hookType} "$@"`,
    '',
  ].join('\n');
}

/**
 * Directory git runs hooks from, honouring core.hooksPath
 */
export async function resolveHooksDir(
  repoRoot: string,
  executor: CommandExecutor = spawn,
): Promise<string> {
  const result = await executor(['git', 'rev-parse', '--git-path', 'hooks'], { cwd: repoRoot });
  if (result.exitCode !== 0) {
    throw new ConfigError(
      `Unable to locate the hooks directory of ${repoRoot}`,
      ConfigErrorCode.NOT_A_REPOSITORY,
      result.stderr.toString('utf-8').trim(),
    );
  }
  return path.resolve(repoRoot, result.stdout.toString('utf-8').trim());
}

/**
 * Write the hook script. A hook script not written by checkpost is left
 * alone unless `force` is set, in which case it is moved aside.
 */
export async function installHook(
  hooksDir: string,
  hookType: string,
  options: { force?: boolean } = {},
): Promise<InstallResult> {
  const hookPath = path.join(hooksDir, hookType);
  await fs.ensureDir(hooksDir);

  let status: InstallStatus = 'installed';
  let backupPath: string | undefined;

  if (await fs.pathExists(hookPath)) {
    const existing = await fs.readFile(hookPath, 'utf-8');
    if (existing.includes(HOOK_SIGNATURE)) {
      status = 'updated';
    } else if (!options.force) {
      return { status: 'exists', hookPath };
    } else {
      backupPath = `${hookPath}${BACKUP_SUFFIX}`;
      await fs.move(hookPath, backupPath, { overwrite: true });
    }
  }

  await fs.writeFile(hookPath, hookScript(hookType), { mode: 0o755 });
  await fs.chmod(hookPath, 0o755);
  return { status, hookPath, backupPath };
}

/**
 * Remove the hook script, putting back any hook it replaced
 */
export async function uninstallHook(hooksDir: string, hookType: string): Promise<UninstallResult> {
  const hookPath = path.join(hooksDir, hookType);
  if (!(await fs.pathExists(hookPath))) {
    return { status: 'not-installed', hookPath };
  }

  const existing = await fs.readFile(hookPath, 'utf-8');
  if (!existing.includes(HOOK_SIGNATURE)) {
    return { status: 'foreign', hookPath };
  }

  await fs.remove(hookPath);

  const backupPath = `${hookPath}${BACKUP_SUFFIX}`;
  if (await fs.pathExists(backupPath)) {
    await fs.move(backupPath, hookPath);
    return { status: 'restored', hookPath };
  }
  return { status: 'removed', hookPath };
}
