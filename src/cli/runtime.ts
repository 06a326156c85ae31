// Per-command setup: configuration, logging and tracing

import * as path from 'path';
import { Logger, LogLevel, toLogLevel } from '../core/logger.js';
import type { ToolboxConfig } from '../core/schemas.js';
import { CONFIG_DIR, ConfigService } from '../services/config/config-service.js';
import { setupTracing } from '../services/trace/tracing.js';

export interface Runtime {
  basePath: string;
  config: ToolboxConfig;
  /** Flush spans when tracing is enabled */
  shutdown(): Promise<void>;
}

export interface RuntimeOptions {
  /** Force debug logging regardless of the configured level */
  debug?: boolean;
}

/**
 * Load .toolbox/config.yaml under `basePath` and apply its logging and
 * telemetry sections
 */
export async function loadRuntime(basePath: string, options: RuntimeOptions = {}): Promise<Runtime> {
  const configService = new ConfigService({ baseDir: path.join(basePath, CONFIG_DIR) });
  const config = await configService.load();

  Logger.configure({
    level: options.debug ? LogLevel.DEBUG : toLogLevel(config.logging.level),
    timestamps: config.logging.timestamps
  });

  const provider = config.telemetry.enabled
    ? setupTracing({ serviceName: config.telemetry.serviceName })
    : null;

  return {
    basePath,
    config,
    shutdown: async () => {
      if (provider) {
        await provider.shutdown();
      }
    }
  };
}
