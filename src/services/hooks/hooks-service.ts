/**
 * Git Hooks Service
 *
 * Checks that the secrets scanner (trufflehog) and the hook manager
 * (pre-commit) are installed, writes a .pre-commit-config.yaml that runs
 * the scanner, and registers the git hooks through `pre-commit install`.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { simpleGit, type SimpleGit } from 'simple-git';
import { HookError, NotFoundError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { HooksConfigSchema, type HookType, type HooksConfig } from '../../core/schemas.js';
import { ProcessCommandRunner, type CommandRunner } from './command-runner.js';

export type ToolName = 'trufflehog' | 'pre-commit';

export const TOOL_NAMES: readonly ToolName[] = ['trufflehog', 'pre-commit'];

/**
 * Package-manager command that installs each tool
 */
export const INSTALL_HINTS: Record<ToolName, string> = {
  trufflehog: 'brew install trufflehog',
  'pre-commit': 'pip install pre-commit'
};

export const PRE_COMMIT_CONFIG_FILE = '.pre-commit-config.yaml';

const CONFIG_HEADER = '# Generated by toolbox hooks install\n';

export interface ToolStatus {
  name: ToolName;
  installed: boolean;
  version?: string;
  installHint: string;
}

/**
 * Options for hook installation
 */
export interface HooksInstallOptions {
  /** Overwrite an existing .pre-commit-config.yaml */
  force?: boolean;
  hookTypes?: HookType[];
}

/**
 * Options for the generated .pre-commit-config.yaml
 */
export interface PreCommitConfigOptions {
  /** Stages the trufflehog hook runs in; the configured hook types by default */
  hookTypes?: HookType[];
}

export interface HooksInstallResult {
  configWritten: boolean;
  configPath: string;
  hookTypes: HookType[];
}

export interface HooksServiceOptions {
  baseDir?: string;
  runner?: CommandRunner;
  config?: HooksConfig;
}

/**
 * Git Hooks Service Interface
 */
export interface IHooksService {
  checkTools(): Promise<ToolStatus[]>;
  buildPreCommitConfig(options?: PreCommitConfigOptions): string;
  install(options?: HooksInstallOptions): Promise<HooksInstallResult>;
  uninstall(hookTypes?: HookType[]): Promise<void>;
}

/**
 * Git Hooks Service Implementation
 */
export class HooksService implements IHooksService {
  private git: SimpleGit;
  private runner: CommandRunner;
  private config: HooksConfig;
  private baseDir: string;

  constructor(options: HooksServiceOptions = {}) {
    this.baseDir = options.baseDir ?? '.';
    this.git = simpleGit(this.baseDir);
    this.runner = options.runner ?? new ProcessCommandRunner();
    this.config = options.config ?? HooksConfigSchema.parse({});
  }

  getConfigPath(): string {
    return path.join(this.baseDir, PRE_COMMIT_CONFIG_FILE);
  }

  /**
   * Detects if the base directory is inside a git repository
   */
  async isGitRepository(): Promise<boolean> {
    return this.git.checkIsRepo();
  }

  /**
   * Probe one tool with `<tool> --version`
   */
  async checkTool(name: ToolName): Promise<ToolStatus> {
    const status: ToolStatus = { name, installed: false, installHint: INSTALL_HINTS[name] };
    try {
      const result = await this.runner.run(name, ['--version'], { cwd: this.baseDir });
      if (result.exitCode !== 0) {
        return status;
      }
      const output = (result.stdout.trim() || result.stderr.trim()).split('\n')[0];
      return { ...status, installed: true, version: output || undefined };
    } catch (error) {
      if (error instanceof NotFoundError) {
        return status;
      }
      throw error;
    }
  }

  async checkTools(): Promise<ToolStatus[]> {
    const statuses: ToolStatus[] = [];
    for (const name of TOOL_NAMES) {
      statuses.push(await this.checkTool(name));
    }
    return statuses;
  }

  /**
   * Pre-commit configuration with a local trufflehog hook scanning the
   * commits since HEAD
   */
  buildPreCommitConfig(options: PreCommitConfigOptions = {}): string {
    const hookTypes = options.hookTypes ?? this.config.hookTypes;
    const entry = [
      'trufflehog',
      'git',
      'file://.',
      '--since-commit',
      'HEAD',
      `--results=${this.config.results.join(',')}`,
      '--fail',
      ...this.config.extraArgs
    ].join(' ');

    const document = {
      repos: [
        {
          repo: 'local',
          hooks: [
            {
              id: 'trufflehog',
              name: 'TruffleHog',
              description: 'Detect secrets in your data.',
              entry,
              language: 'system',
              pass_filenames: false,
              stages: hookTypes
            }
          ]
        }
      ]
    };
    return CONFIG_HEADER + yaml.stringify(document);
  }

  private async configExists(): Promise<boolean> {
    try {
      await fs.access(this.getConfigPath());
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Write the pre-commit configuration and register the git hooks
   *
   * @throws HookError if not a git repository or pre-commit fails
   * @throws NotFoundError if pre-commit is not installed
   */
  async install(options: HooksInstallOptions = {}): Promise<HooksInstallResult> {
    if (!await this.isGitRepository()) {
      throw new HookError('Not a git repository', 'Initialize git with "git init" first');
    }

    const [scanner, manager] = await Promise.all([
      this.checkTool('trufflehog'),
      this.checkTool('pre-commit')
    ]);
    if (!manager.installed) {
      throw new NotFoundError('Tool', 'pre-commit');
    }
    if (!scanner.installed) {
      logger.warn(`trufflehog is not installed; the hook will fail until you run: ${scanner.installHint}`);
    }

    const hookTypes = options.hookTypes ?? this.config.hookTypes;
    const configPath = this.getConfigPath();
    let configWritten = false;

    if (options.force || !await this.configExists()) {
      try {
        await fs.writeFile(configPath, this.buildPreCommitConfig({ hookTypes }), 'utf-8');
      } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === 'EACCES') {
          throw new HookError(`Permission denied writing to ${configPath}`, 'Check file permissions');
        }
        throw error;
      }
      configWritten = true;
    } else {
      logger.info(`Keeping existing ${PRE_COMMIT_CONFIG_FILE}; use --force to replace it`);
    }

    for (const hookType of hookTypes) {
      await this.runPreCommit(['install', '--hook-type', hookType]);
    }

    return { configWritten, configPath, hookTypes };
  }

  /**
   * Remove the git hooks registered by pre-commit; the configuration
   * file is left in place
   */
  async uninstall(hookTypes: HookType[] = this.config.hookTypes): Promise<void> {
    if (!await this.isGitRepository()) {
      throw new HookError('Not a git repository');
    }
    for (const hookType of hookTypes) {
      await this.runPreCommit(['uninstall', '--hook-type', hookType]);
    }
  }

  private async runPreCommit(args: string[]): Promise<void> {
    const result = await this.runner.run('pre-commit', args, { cwd: this.baseDir });
    if (result.exitCode !== 0) {
      throw new HookError(
        `pre-commit ${args.join(' ')} failed with exit code ${result.exitCode}`,
        result.stderr.trim() || result.stdout.trim() || undefined
      );
    }
    logger.debug(`pre-commit ${args.join(' ')}`, { output: result.stdout.trim() });
  }
}
