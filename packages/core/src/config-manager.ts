import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type CostwiseConfig,
  type ModelProviderName,
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  DEFAULT_MODELS,
  costwiseConfigSchema,
  ConfigError,
  errorMessage,
} from '@costwise/shared';

/** Section-wise partial config, e.g. from command-line flags. */
export type ConfigOverrides = {
  [K in keyof CostwiseConfig]?: Partial<CostwiseConfig[K]>;
};

export class ConfigManager {
  private config: CostwiseConfig = DEFAULT_CONFIG;
  private source: string | null = null;

  async load(options?: { configPath?: string }): Promise<CostwiseConfig> {
    // 1. Start with defaults
    let merged: Record<string, unknown> = { ...structuredClone(DEFAULT_CONFIG) };

    // 2. Load config file
    const fileConfig = await this.loadConfigFile(options?.configPath);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Load environment variables
    merged = deepMerge(merged, this.loadEnvVars(merged));

    // 4. Validate
    this.config = validate(merged);
    return this.config;
  }

  get<K extends keyof CostwiseConfig>(key: K): CostwiseConfig[K] {
    return this.config[key];
  }

  getAll(): CostwiseConfig {
    return this.config;
  }

  /** Path of the file the config was read from, if any. */
  getSource(): string | null {
    return this.source;
  }

  set(overrides: ConfigOverrides): CostwiseConfig {
    const patch: Record<string, unknown> = { ...overrides };
    this.config = validate(deepMerge({ ...structuredClone(this.config) }, patch));
    return this.config;
  }

  private async loadConfigFile(configPath?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      if (!existsSync(configPath)) {
        throw new ConfigError(`config file not found: ${configPath}`);
      }
      return this.parseConfigFile(resolve(configPath));
    }

    // Search cwd and parent directories
    let dir = resolve(process.cwd());

    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`${p} could not be parsed: ${errorMessage(err)}`);
    }
    // An empty YAML file parses to null
    if (parsed === null || parsed === undefined) {
      parsed = {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    this.source = p;
    return parsed;
  }

  private loadEnvVars(base: Record<string, unknown>): Record<string, unknown> {
    const env = process.env;
    const config: Record<string, unknown> = {};
    const providers: Record<string, unknown> = {};

    const apiKeys: Array<[ModelProviderName, string | undefined]> = [
      ['anthropic', env.COSTWISE_ANTHROPIC_API_KEY],
      ['openai', env.COSTWISE_OPENAI_API_KEY],
    ];
    for (const [name, apiKey] of apiKeys) {
      if (!apiKey) continue;
      const existing = lookup(base, 'providers', name);
      providers[name] = {
        apiKey,
        enabled: true,
        ...(isRecord(existing) && typeof existing.model === 'string' ? {} : { model: DEFAULT_MODELS[name] }),
      };
    }
    if (Object.keys(providers).length > 0) {
      config.providers = providers;
    }

    if (env.COSTWISE_PROVIDER) {
      config.agent = { provider: env.COSTWISE_PROVIDER };
    }

    if (env.COSTWISE_TOOL_CALL_LIMIT) {
      config.budget = { toolCallLimit: Number(env.COSTWISE_TOOL_CALL_LIMIT) };
    }

    if (env.COSTWISE_CONTEXT_PAIRS) {
      config.conversation = { contextPairs: Number(env.COSTWISE_CONTEXT_PAIRS) };
    }

    if (env.COSTWISE_COST_RULES) {
      config.costRules = { path: env.COSTWISE_COST_RULES };
    }

    if (env.COSTWISE_LOG_LEVEL) {
      config.logging = { level: env.COSTWISE_LOG_LEVEL };
    }

    return config;
  }
}

function validate(merged: Record<string, unknown>): CostwiseConfig {
  const result = costwiseConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookup(root: Record<string, unknown>, ...keys: string[]): unknown {
  let current: unknown = root;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const from = source[key];
    const into = target[key];
    if (from === undefined) continue;
    result[key] = isRecord(from) && isRecord(into) ? deepMerge(into, from) : from;
  }
  return result;
}
