// Hooks commands for the toolbox CLI

import { Command } from 'commander';
import { z } from 'zod';
import { ValidationError } from '../../core/errors.js';
import { HookTypeSchema } from '../../core/schemas.js';
import { HooksService } from '../../services/hooks/hooks-service.js';
import { loadRuntime } from '../runtime.js';
import { info, success, warn, withErrorHandling } from '../utils/error-handler.js';

interface PathOptions {
  path: string;
  debug?: boolean;
}

interface InstallOptions extends PathOptions {
  force?: boolean;
  hookType?: string[];
}

function parseHookTypes(values: string[] | undefined) {
  if (values === undefined) {
    return undefined;
  }
  const parsed = z.array(HookTypeSchema).safeParse(values);
  if (!parsed.success) {
    throw new ValidationError(
      `Unsupported hook type in '${values.join(', ')}'. Supported: ${HookTypeSchema.options.join(', ')}`,
      'hook-type'
    );
  }
  return parsed.data;
}

/**
 * Registers the hooks command and subcommands
 *
 * Supports:
 * - toolbox hooks doctor
 * - toolbox hooks install [--force] [--hook-type <types...>]
 * - toolbox hooks uninstall [--hook-type <types...>]
 */
export function registerHooksCommand(program: Command): void {
  const hooksCommand = program
    .command('hooks')
    .description('Manage secrets-scanning git hooks (trufflehog run by pre-commit)');

  hooksCommand
    .command('doctor')
    .description('Check that trufflehog and pre-commit are installed')
    .option('-p, --path <path>', 'Repository path', process.cwd())
    .option('--debug', 'Enable debug logging')
    .action(withErrorHandling(async (options: PathOptions) => {
      const runtime = await loadRuntime(options.path, { debug: options.debug });
      const service = new HooksService({ baseDir: options.path, config: runtime.config.hooks });

      try {
        const statuses = await service.checkTools();
        for (const status of statuses) {
          if (status.installed) {
            success(`${status.name} ${status.version ?? '(version unknown)'}`);
          } else {
            warn(`${status.name} is not installed. Install it with: ${status.installHint}`);
          }
        }

        if (statuses.some(status => !status.installed)) {
          process.exitCode = 4;
        }
      } finally {
        await runtime.shutdown();
      }
    }));

  hooksCommand
    .command('install')
    .description('Write .pre-commit-config.yaml and run "pre-commit install"')
    .option('-p, --path <path>', 'Repository path', process.cwd())
    .option('-f, --force', 'Replace an existing .pre-commit-config.yaml')
    .option('--hook-type <types...>', 'Hook types to install (pre-commit, pre-push)')
    .option('--debug', 'Enable debug logging')
    .action(withErrorHandling(async (options: InstallOptions) => {
      const runtime = await loadRuntime(options.path, { debug: options.debug });
      const service = new HooksService({ baseDir: options.path, config: runtime.config.hooks });

      try {
        console.log('Installing git hooks...');
        const result = await service.install({
          force: options.force,
          hookTypes: parseHookTypes(options.hookType)
        });

        if (result.configWritten) {
          success(`Wrote ${result.configPath}`);
        } else {
          info(`Kept existing ${result.configPath}`);
        }
        success(`Installed ${result.hookTypes.join(', ')} hook${result.hookTypes.length === 1 ? '' : 's'}`);
        console.log('\nCommits will now be scanned for secrets by trufflehog.');
      } finally {
        await runtime.shutdown();
      }
    }));

  hooksCommand
    .command('uninstall')
    .description('Remove the git hooks registered by pre-commit')
    .option('-p, --path <path>', 'Repository path', process.cwd())
    .option('--hook-type <types...>', 'Hook types to remove (pre-commit, pre-push)')
    .option('--debug', 'Enable debug logging')
    .action(withErrorHandling(async (options: InstallOptions) => {
      const runtime = await loadRuntime(options.path, { debug: options.debug });
      const service = new HooksService({ baseDir: options.path, config: runtime.config.hooks });

      try {
        console.log('Removing git hooks...');
        await service.uninstall(parseHookTypes(options.hookType));
        success('Hooks uninstalled');
      } finally {
        await runtime.shutdown();
      }
    }));
}
