import Conf from 'conf';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

// Zod schemas for validation
const StoredConfigSchema = z.object({
  model: z.string().min(1).optional(),
  apiBase: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  maxSteps: z.number().int().positive().optional(),
  maxContextChars: z.number().int().positive().optional(),
  skillsDir: z.string().min(1).optional(),
  debug: z.boolean().optional(),
});

const AgentSettingsSchema = z.object({
  model: z.string().min(1),
  apiBase: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  maxSteps: z.number().int().positive(),
  maxContextChars: z.number().int().positive(),
  skillsDir: z.string().min(1),
  debug: z.boolean(),
});

// `config set` receives strings from the command line.
const ConfigValueSchema = z.object({
  model: z.string().min(1),
  apiBase: z.string().url(),
  apiKey: z.string().min(1),
  maxSteps: z.coerce.number().int().positive(),
  maxContextChars: z.coerce.number().int().positive(),
  skillsDir: z.string().min(1),
  debug: z.enum(['true', 'false']).transform(value => value === 'true'),
}).partial();

export type StoredConfig = z.infer<typeof StoredConfigSchema>;
export type AgentSettings = z.infer<typeof AgentSettingsSchema>;
export type ConfigKey = keyof StoredConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'model',
  'apiBase',
  'apiKey',
  'maxSteps',
  'maxContextChars',
  'skillsDir',
  'debug',
];

export const DEFAULT_SETTINGS = {
  model: 'gpt-5',
  maxSteps: 20,
  maxContextChars: 200_000,
  skillsDir: 'skills/',
  debug: false,
} as const;

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(known => known === key);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`)
    .join('; ');
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

export interface SettingsLayers {
  stored?: StoredConfig;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<AgentSettings>;
}

/**
 * Merge defaults < stored config < environment < explicit overrides and
 * validate the result.
 */
export function resolveSettings(layers: SettingsLayers = {}): AgentSettings {
  const stored: StoredConfig = layers.stored ?? {};
  const env: NodeJS.ProcessEnv = layers.env ?? {};
  const overrides: Partial<AgentSettings> = layers.overrides ?? {};

  const merged = {
    model: overrides.model ?? nonEmpty(env.OPENAI_MODEL) ?? stored.model ?? DEFAULT_SETTINGS.model,
    apiBase: overrides.apiBase ?? nonEmpty(env.OPENAI_API_BASE) ?? stored.apiBase,
    apiKey: overrides.apiKey ?? nonEmpty(env.OPENAI_API_KEY) ?? stored.apiKey,
    maxSteps: overrides.maxSteps ?? stored.maxSteps ?? DEFAULT_SETTINGS.maxSteps,
    maxContextChars: overrides.maxContextChars ?? stored.maxContextChars ?? DEFAULT_SETTINGS.maxContextChars,
    skillsDir: overrides.skillsDir ?? stored.skillsDir ?? DEFAULT_SETTINGS.skillsDir,
    debug: overrides.debug ?? stored.debug ?? DEFAULT_SETTINGS.debug,
  };

  const parsed = AgentSettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export interface ConfigManagerOptions {
  /** Directory holding the config file; the per-user config dir when omitted */
  cwd?: string;
  configName?: string;
}

/**
 * Persisted defaults (`skillbench config ...`).
 */
export class ConfigManager {
  private store: Conf<StoredConfig>;
  private static instance: ConfigManager;

  constructor(options: ConfigManagerOptions = {}) {
    this.store = new Conf<StoredConfig>({
      projectName: 'skillbench',
      ...(options.cwd ? { cwd: options.cwd } : {}),
      ...(options.configName ? { configName: options.configName } : {}),
    });
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  getConfig(): StoredConfig {
    const parsed = StoredConfigSchema.safeParse(this.store.store);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Stored configuration at ${this.store.path} is invalid: ${formatIssues(parsed.error)}`
      );
    }
    return parsed.data;
  }

  /**
   * Validate a command-line value for `key` and store it.
   */
  setFromString(key: string, rawValue: string): void {
    if (!isConfigKey(key)) {
      throw new ConfigurationError(`Unknown config key: ${key}. Known keys: ${CONFIG_KEYS.join(', ')}`);
    }

    const parsed = ConfigValueSchema.safeParse({ [key]: rawValue });
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid value for ${formatIssues(parsed.error)}`);
    }
    this.store.set(parsed.data);
  }

  unset(key: string): void {
    if (!isConfigKey(key)) {
      throw new ConfigurationError(`Unknown config key: ${key}. Known keys: ${CONFIG_KEYS.join(', ')}`);
    }
    this.store.delete(key);
  }

  resolveSettings(overrides: Partial<AgentSettings> = {}, env: NodeJS.ProcessEnv = process.env): AgentSettings {
    return resolveSettings({ stored: this.getConfig(), env, overrides });
  }

  reset() {
    this.store.clear();
  }

  getConfigPath(): string {
    return this.store.path;
  }
}
