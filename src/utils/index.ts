/**
 * Utility Functions
 */

import path from 'path';
import fs from 'fs-extra';

/**
 * Get environment variable with default value
 */
export function getEnv(key: string, defaultValue: string, env: NodeJS.ProcessEnv = process.env): string {
  return env[key] ?? defaultValue;
}

/**
 * Split a comma or whitespace separated list of names, e.g. the SKIP variable
 */
export function parseNameList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(/[,\s]+/)
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Locate an executable on PATH
 * @returns the absolute path, or null when not found
 */
export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<string | null> {
  if (name.includes('/') || name.includes(path.sep)) {
    const candidate = path.resolve(cwd, name);
    return (await isExecutableFile(candidate)) ? candidate : null;
  }

  const directories = getEnv('PATH', '', env)
    .split(path.delimiter)
    .filter((dir) => dir.length > 0);
  const extensions =
    process.platform === 'win32' ? ['', ...getEnv('PATHEXT', '.EXE;.CMD;.BAT', env).split(';')] : [''];

  for (const dir of directories) {
    for (const extension of extensions) {
      const candidate = path.join(dir, `${name}${extension}`);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.X_OK);
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}
