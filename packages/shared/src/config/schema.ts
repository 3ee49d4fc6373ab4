import { z } from 'zod';

export const DEFAULT_SERVER_URL = 'http://localhost:8080/api';
export const DEFAULT_SHELL_CONFIG_DIR = '~/.evaluator';

export const ServerConfigSchema = z
  .object({
    url: z.string().url().default(DEFAULT_SERVER_URL),
    timeoutMs: z.number().int().positive().default(30000),
  })
  .strict();

export const PollConfigSchema = z
  .object({
    intervalMs: z.number().int().nonnegative().default(5000),
    backoffFactor: z.number().min(1).default(1.5),
    maxMultiplier: z.number().min(1).default(10),
  })
  .strict();

export const RunnerConfigSchema = z
  .object({
    composeCommand: z.array(z.string().min(1)).min(1).default(['docker', 'compose']),
    pull: z.boolean().default(true),
  })
  .strict();

export const WorkspaceConfigSchema = z
  .object({
    /** Parent directory for job workspaces; the OS temp dir when unset */
    baseDir: z.string().optional(),
    /** Path of the convenience link to the latest workspace; `false` disables it */
    lastLink: z.union([z.string().min(1), z.literal(false)]).default('last'),
  })
  .strict();

export const PublishConfigSchema = z
  .object({
    registry: z.string().min(1).optional(),
  })
  .strict();

export const LoggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    eventsFile: z.string().optional(),
  })
  .strict();

export const ConfigSchema = z
  .object({
    configVersion: z.literal(1).default(1),
    server: ServerConfigSchema.default({}),
    /** Directory holding the `config` credentials file */
    shellConfigDir: z.string().default(DEFAULT_SHELL_CONFIG_DIR),
    evaluatorVersion: z.string().optional(),
    poll: PollConfigSchema.default({}),
    runner: RunnerConfigSchema.default({}),
    workspace: WorkspaceConfigSchema.default({}),
    publish: PublishConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type PollConfig = z.infer<typeof PollConfigSchema>;
export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;
export type PublishConfig = z.infer<typeof PublishConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
