import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type ConfigInput } from '@evaluator/shared';

export const USER_CONFIG_DIR = '.evaluator';
export const USER_CONFIG_FILE = 'config.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: ConfigInput; // CLI flags
  env?: NodeJS.ProcessEnv; // Environment variables
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /** Overrides taken from `EVALUATOR_*` environment variables. */
  static envConfig(env: NodeJS.ProcessEnv): ConfigRecord {
    const config: ConfigRecord = {};
    if (env.EVALUATOR_SERVER_URL) {
      config.server = { url: env.EVALUATOR_SERVER_URL };
    }
    if (env.EVALUATOR_REGISTRY) {
      config.publish = { registry: env.EVALUATOR_REGISTRY };
    }
    return config;
  }

  static load(options: ConfigOptions = {}): Config {
    const env = options.env ?? process.env;

    // 1. User config: ~/.evaluator/config.yaml
    const userConfigPath = path.join(os.homedir(), USER_CONFIG_DIR, USER_CONFIG_FILE);
    const userConfig = this.loadYaml(userConfigPath);

    // 2. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 3. Environment, then 4. CLI flags
    const envConfig = this.envConfig(env);
    const flagConfig: ConfigRecord = options.flags ?? {};

    let mergedConfig = this.mergeConfigs({}, userConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, explicitConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, envConfig);
    mergedConfig = this.mergeConfigs(mergedConfig, flagConfig);

    // Defaults are filled in by the schema
    const result = ConfigSchema.safeParse(mergedConfig);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
