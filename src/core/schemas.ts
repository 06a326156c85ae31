// Zod schemas for toolbox configuration

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const HookTypeSchema = z.enum(['pre-commit', 'pre-push']);

/**
 * Defaults applied to every HTTP session created by the configured client
 */
export const HttpConfigSchema = z.object({
  baseUrl: z.string().url('Invalid base URL').optional(),
  verbose: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(30_000),
  retryIntervalMs: z.number().int().nonnegative().default(5_000)
});

/**
 * Settings for the generated .pre-commit-config.yaml
 */
export const HooksConfigSchema = z.object({
  hookTypes: z.array(HookTypeSchema).min(1, 'At least one hook type is required').default(['pre-commit']),
  results: z.array(z.enum(['verified', 'unknown', 'unverified', 'filtered_unverified']))
    .min(1)
    .default(['verified', 'unknown']),
  extraArgs: z.array(z.string()).default([])
});

export const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(false),
  serviceName: z.string().min(1).default('toolbox')
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  timestamps: z.boolean().default(false)
});

/**
 * Full .toolbox/config.yaml schema; every section is optional
 */
export const ToolboxConfigSchema = z.object({
  http: HttpConfigSchema.default({}),
  hooks: HooksConfigSchema.default({}),
  telemetry: TelemetryConfigSchema.default({}),
  logging: LoggingConfigSchema.default({})
});

export type HookType = z.infer<typeof HookTypeSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type HooksConfig = z.infer<typeof HooksConfigSchema>;
export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ToolboxConfig = z.infer<typeof ToolboxConfigSchema>;
/** Shape accepted in the YAML file, before defaults are applied */
export type ToolboxConfigInput = z.input<typeof ToolboxConfigSchema>;
