import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, assertHookType } from '../core/config/loader.js';
import { ConfigError, HookLoadError } from '../core/errors/index.js';
import { HookRunner } from '../core/runner/index.js';
import { createContext, resolveRepoRoot } from '../context/index.js';
import { ConfiguredHookLoader } from '../hooks/loader.js';
import { Logger } from '../utils/logger.js';
import { Printer } from './printer.js';
import { installHook, resolveHooksDir, uninstallHook } from './installer.js';

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  configuration: 78,
} as const;

interface RunOptions {
  all?: boolean;
  debug?: boolean;
}

interface InstallOptions {
  force?: boolean;
}

export function createProgram(setExitCode: (code: number) => void, logger: Logger): Command {
  const program = new Command();

  program
    .name('checkpost')
    .description('Run configured checks from git hooks')
    .version('0.1.0');

  program
    .command('run')
    .description('Run the hooks configured for a hook type')
    .argument('[hook-type]', 'hook type to run', 'pre-commit')
    .option('--all', 'run against all tracked files instead of staged changes')
    .option('--debug', 'print debug output')
    .action(async (hookTypeArg: string, options: RunOptions) => {
      if (options.debug) {
        logger.setDebug(true);
      }
      const hookType = assertHookType(hookTypeArg);
      const repoRoot = await resolveRepoRoot(process.cwd());
      const config = await loadConfig({ cwd: repoRoot });
      const context = createContext(hookType, { repoRoot, all: options.all, logger });

      const runner = new HookRunner({
        loader: new ConfiguredHookLoader({ config, context, logger }),
        context,
        sink: new Printer({ hookType, logger }),
        logger,
      });

      const succeeded = await runner.run();
      setExitCode(succeeded ? EXIT_CODES.success : EXIT_CODES.failure);
    });

  program
    .command('list')
    .description('List the hooks configured for a hook type')
    .argument('[hook-type]', 'hook type to list', 'pre-commit')
    .action(async (hookTypeArg: string) => {
      const hookType = assertHookType(hookTypeArg);
      const repoRoot = await resolveRepoRoot(process.cwd());
      const config = await loadConfig({ cwd: repoRoot });
      const context = createContext(hookType, { repoRoot, all: true, logger });
      const hooks = await new ConfiguredHookLoader({ config, context, logger }).loadHooks();

      console.log(chalk.bold(`Available ${hookType} hooks:`));
      for (const hook of hooks) {
        const state = hook.isEnabled() ? chalk.green('enabled') : chalk.dim('disabled');
        const required = hook.isRequired() ? chalk.yellow(' (required)') : '';
        console.log(`  ${hook.name}: ${state}${required}`);
        console.log(chalk.dim(`    ${hook.description}`));
      }
      setExitCode(EXIT_CODES.success);
    });

  program
    .command('install')
    .description('Install the git hook script')
    .argument('[hook-type]', 'hook type to install', 'pre-commit')
    .option('--force', 'move an existing hook script aside')
    .action(async (hookTypeArg: string, options: InstallOptions) => {
      const hookType = assertHookType(hookTypeArg);
      const repoRoot = await resolveRepoRoot(process.cwd());
      const result = await installHook(await resolveHooksDir(repoRoot), hookType, options);

      switch (result.status) {
        case 'exists':
          logger.warn(`A ${hookType} hook already exists at ${result.hookPath}`);
          logger.info('Use --force to move it aside.');
          setExitCode(EXIT_CODES.failure);
          return;
        case 'updated':
          console.log(chalk.green(`Updated ${result.hookPath}`));
          break;
        case 'installed':
          console.log(chalk.green(`Installed ${result.hookPath}`));
          if (result.backupPath) {
            console.log(chalk.dim(`Previous hook moved to ${result.backupPath}`));
          }
          break;
      }
      setExitCode(EXIT_CODES.success);
    });

  program
    .command('uninstall')
    .description('Remove the git hook script')
    .argument('[hook-type]', 'hook type to remove', 'pre-commit')
    .action(async (hookTypeArg: string) => {
      const hookType = assertHookType(hookTypeArg);
      const repoRoot = await resolveRepoRoot(process.cwd());
      const result = await uninstallHook(await resolveHooksDir(repoRoot), hookType);

      switch (result.status) {
        case 'foreign':
          logger.warn(`${result.hookPath} was not installed by checkpost; leaving it alone`);
          setExitCode(EXIT_CODES.failure);
          return;
        case 'not-installed':
          console.log(chalk.dim(`No ${hookType} hook installed`));
          break;
        case 'restored':
          console.log(chalk.green(`Removed checkpost and restored the previous ${hookType} hook`));
          break;
        case 'removed':
          console.log(chalk.green(`Removed ${result.hookPath}`));
          break;
      }
      setExitCode(EXIT_CODES.success);
    });

  return program;
}

export async function main(argv: string[] = process.argv, logger = new Logger()): Promise<number> {
  let exitCode: number = EXIT_CODES.success;
  const program = createProgram((code) => {
    exitCode = code;
  }, logger);

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      if (err.suggestion) {
        logger.info(err.suggestion);
      }
      return EXIT_CODES.configuration;
    }
    if (err instanceof HookLoadError) {
      logger.error(err.message);
      logger.info(err.hint);
      return EXIT_CODES.configuration;
    }
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error(`Fatal Error: ${error.message}`);
    if (error.stack) {
      logger.debug(error.stack);
    }
    return EXIT_CODES.failure;
  }
}
