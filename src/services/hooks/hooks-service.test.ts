/**
 * Tests for the Git Hooks Service
 *
 * External tools are replaced by a scripted CommandRunner and the git
 * repository check is stubbed, so nothing outside the test process runs.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { HooksService, PRE_COMMIT_CONFIG_FILE } from './hooks-service.js';
import type { CommandResult, CommandRunner, CommandRunOptions } from './command-runner.js';
import { HookError, NotFoundError } from '../../core/errors.js';
import { HooksConfigSchema } from '../../core/schemas.js';

interface RecordedCall {
  command: string;
  args: string[];
  cwd?: string;
}

/**
 * CommandRunner answering from a table keyed by "command arg arg"
 */
class ScriptedRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly responses = new Map<string, CommandResult | Error>();

  respond(commandLine: string, result: Partial<CommandResult> | Error): this {
    this.responses.set(
      commandLine,
      result instanceof Error ? result : { stdout: '', stderr: '', exitCode: 0, ...result }
    );
    return this;
  }

  async run(command: string, args: string[], options: CommandRunOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, args, cwd: options.cwd });
    const response = this.responses.get([command, ...args].join(' '));
    if (response instanceof Error) {
      throw response;
    }
    return response ?? { stdout: '', stderr: '', exitCode: 0 };
  }

  commandLines(): string[] {
    return this.calls.map(call => [call.command, ...call.args].join(' '));
  }
}

let testCounter = 0;
function getTestDir(): string {
  return `.toolbox-test-hooks-${process.pid}-${++testCounter}`;
}

describe('HooksService', () => {
  let testDir: string;
  let runner: ScriptedRunner;
  let service: HooksService;

  beforeEach(async () => {
    testDir = getTestDir();
    await fs.mkdir(testDir, { recursive: true });
    runner = new ScriptedRunner()
      .respond('trufflehog --version', { stderr: 'trufflehog 3.63.0\n' })
      .respond('pre-commit --version', { stdout: 'pre-commit 3.7.1\n' });
    service = new HooksService({ baseDir: testDir, runner });
    vi.spyOn(service, 'isGitRepository').mockResolvedValue(true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('checkTools', () => {
    it('should report both tools with their versions', async () => {
      const statuses = await service.checkTools();

      expect(statuses).toEqual([
        { name: 'trufflehog', installed: true, version: 'trufflehog 3.63.0', installHint: 'brew install trufflehog' },
        { name: 'pre-commit', installed: true, version: 'pre-commit 3.7.1', installHint: 'pip install pre-commit' }
      ]);
      expect(runner.calls[0].cwd).toBe(testDir);
    });

    it('should report a missing executable as not installed', async () => {
      runner.respond('trufflehog --version', new NotFoundError('Command', 'trufflehog'));

      const [scanner] = await service.checkTools();

      expect(scanner).toEqual({ name: 'trufflehog', installed: false, installHint: 'brew install trufflehog' });
    });

    it('should report a failing version probe as not installed', async () => {
      runner.respond('pre-commit --version', { exitCode: 127, stderr: 'broken' });

      const statuses = await service.checkTools();

      expect(statuses[1].installed).toBe(false);
    });

    it('should propagate unexpected runner errors', async () => {
      runner.respond('trufflehog --version', new Error('spawn EPERM'));

      await expect(service.checkTools()).rejects.toThrow('spawn EPERM');
    });
  });

  describe('buildPreCommitConfig', () => {
    it('should declare a local trufflehog hook', () => {
      const content = service.buildPreCommitConfig();

      expect(content.startsWith('# Generated by toolbox hooks install\n')).toBe(true);
      expect(yaml.parse(content)).toEqual({
        repos: [
          {
            repo: 'local',
            hooks: [
              {
                id: 'trufflehog',
                name: 'TruffleHog',
                description: 'Detect secrets in your data.',
                entry: 'trufflehog git file://. --since-commit HEAD --results=verified,unknown --fail',
                language: 'system',
                pass_filenames: false,
                stages: ['pre-commit']
              }
            ]
          }
        ]
      });
    });

    it('should honour configured results, extra arguments and stages', () => {
      const configured = new HooksService({
        baseDir: testDir,
        runner,
        config: HooksConfigSchema.parse({ results: ['verified'], extraArgs: ['--no-update'] })
      });

      const hook = yaml.parse(configured.buildPreCommitConfig({ hookTypes: ['pre-commit', 'pre-push'] })).repos[0].hooks[0];

      expect(hook.entry).toBe('trufflehog git file://. --since-commit HEAD --results=verified --fail --no-update');
      expect(hook.stages).toEqual(['pre-commit', 'pre-push']);
    });
  });

  describe('install', () => {
    it('should refuse to run outside a git repository', async () => {
      vi.spyOn(service, 'isGitRepository').mockResolvedValue(false);

      await expect(service.install()).rejects.toThrow(HookError);
      await expect(service.install()).rejects.toThrow('Not a git repository');
    });

    it('should require pre-commit', async () => {
      runner.respond('pre-commit --version', new NotFoundError('Command', 'pre-commit'));

      await expect(service.install()).rejects.toThrow('Tool not found: pre-commit');
    });

    it('should write the config and register the hook', async () => {
      const result = await service.install();

      expect(result).toEqual({
        configWritten: true,
        configPath: `${testDir}/${PRE_COMMIT_CONFIG_FILE}`,
        hookTypes: ['pre-commit']
      });
      const written = await fs.readFile(result.configPath, 'utf-8');
      expect(written).toBe(service.buildPreCommitConfig());
      expect(runner.commandLines()).toEqual([
        'trufflehog --version',
        'pre-commit --version',
        'pre-commit install --hook-type pre-commit'
      ]);
    });

    it('should install one hook per requested type', async () => {
      await service.install({ hookTypes: ['pre-commit', 'pre-push'] });

      expect(runner.commandLines().slice(2)).toEqual([
        'pre-commit install --hook-type pre-commit',
        'pre-commit install --hook-type pre-push'
      ]);
    });

    it('should keep an existing config unless forced', async () => {
      const configPath = `${testDir}/${PRE_COMMIT_CONFIG_FILE}`;
      await fs.writeFile(configPath, 'repos: []\n', 'utf-8');
      vi.spyOn(console, 'info').mockImplementation(() => undefined);

      const kept = await service.install();
      expect(kept.configWritten).toBe(false);
      expect(await fs.readFile(configPath, 'utf-8')).toBe('repos: []\n');

      const replaced = await service.install({ force: true });
      expect(replaced.configWritten).toBe(true);
      expect(await fs.readFile(configPath, 'utf-8')).toBe(service.buildPreCommitConfig());
    });

    it('should warn but continue when trufflehog is missing', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      runner.respond('trufflehog --version', new NotFoundError('Command', 'trufflehog'));

      const result = await service.install();

      expect(result.configWritten).toBe(true);
      expect(warn).toHaveBeenCalledWith(
        '[toolbox] [WARN] trufflehog is not installed; the hook will fail until you run: brew install trufflehog'
      );
    });

    it('should surface a failing pre-commit install', async () => {
      runner.respond('pre-commit install --hook-type pre-commit', {
        exitCode: 1,
        stderr: 'An error has occurred: core.hooksPath is set\n'
      });

      const error = await service.install().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(HookError);
      expect(error).toMatchObject({
        message: 'pre-commit install --hook-type pre-commit failed with exit code 1',
        details: 'An error has occurred: core.hooksPath is set'
      });
    });
  });

  describe('uninstall', () => {
    it('should remove the configured hook types', async () => {
      await service.uninstall(['pre-commit', 'pre-push']);

      expect(runner.commandLines()).toEqual([
        'pre-commit uninstall --hook-type pre-commit',
        'pre-commit uninstall --hook-type pre-push'
      ]);
    });

    it('should refuse to run outside a git repository', async () => {
      vi.spyOn(service, 'isGitRepository').mockResolvedValue(false);

      await expect(service.uninstall()).rejects.toThrow('Not a git repository');
    });
  });
});
