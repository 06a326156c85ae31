/**
 * Configuration Service
 *
 * Loads and provides access to settings from .toolbox/config.yaml.
 * Every section falls back to its defaults when absent, and the whole
 * file is optional.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import {
  ToolboxConfigSchema,
  type HooksConfig,
  type HttpConfig,
  type LoggingConfig,
  type TelemetryConfig,
  type ToolboxConfig,
  type ToolboxConfigInput
} from '../../core/schemas.js';
import { ValidationError } from '../../core/errors.js';

export const CONFIG_DIR = '.toolbox';
export const CONFIG_FILE = 'config.yaml';

/**
 * Configuration Service
 */
export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: ToolboxConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir || CONFIG_DIR;
    this.configPath = path.join(this.baseDir, CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, with caching
   *
   * @throws ValidationError when the file exists but is not valid
   */
  async load(): Promise<ToolboxConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let raw: unknown = {};
    let content: string | null = null;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code !== 'ENOENT') {
        throw error;
      }
    }

    if (content !== null) {
      try {
        raw = yaml.parse(content) ?? {};
      } catch (error) {
        throw new ValidationError(
          `Invalid YAML in ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    const parsed = ToolboxConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue ? issue.path.join('.') : undefined;
      throw new ValidationError(
        `Invalid configuration in ${this.configPath}: ${issue ? issue.message : 'unknown issue'}`,
        field,
        { issues: parsed.error.issues.length }
      );
    }

    this.cachedConfig = parsed.data;
    return parsed.data;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  async getHttpConfig(): Promise<HttpConfig> {
    return (await this.load()).http;
  }

  async getHooksConfig(): Promise<HooksConfig> {
    return (await this.load()).hooks;
  }

  async getTelemetryConfig(): Promise<TelemetryConfig> {
    return (await this.load()).telemetry;
  }

  async getLoggingConfig(): Promise<LoggingConfig> {
    return (await this.load()).logging;
  }

  /**
   * Save configuration to file
   */
  async saveConfig(config: ToolboxConfigInput): Promise<void> {
    const parsed = ToolboxConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        `Refusing to save invalid configuration: ${issue ? issue.message : 'unknown issue'}`,
        issue ? issue.path.join('.') : undefined
      );
    }
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(this.configPath, yaml.stringify(config), 'utf-8');
    this.cachedConfig = parsed.data;
  }
}
