import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { ContainerConfigSchema, type ContainerConfig } from './types.js';
import { ConfigError, toError } from './errors.js';

export const CONFIG_DIR_NAME = '.adaptive-container';
export const PROJECT_CONFIG_FILE = '.adaptive-container.yaml';

type RawConfig = Record<string, unknown>;

export class ConfigManager {
  private config: ContainerConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir ?? join(homedir(), CONFIG_DIR_NAME);
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: RawConfig, env: NodeJS.ProcessEnv = process.env): ContainerConfig {
    let raw: RawConfig = {};

    // 1. Global config
    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));

    // 2. Project config
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));

    // 3. Environment variables
    raw = this.applyEnvVars(raw, env);

    // 4. Overrides
    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    // 5. Validate with Zod
    const parsed = ContainerConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): ContainerConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }

    if (parsed === null || parsed === undefined) return {};
    if (!this.isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
    const storage: RawConfig = this.isRecord(raw.storage) ? { ...raw.storage } : {};
    const logging: RawConfig = this.isRecord(raw.logging) ? { ...raw.logging } : {};

    if (env.ADAPTIVE_CONTAINER_STORAGE_DRIVER) {
      storage.driver = env.ADAPTIVE_CONTAINER_STORAGE_DRIVER;
    }
    if (env.ADAPTIVE_CONTAINER_STORAGE_PATH) {
      storage.path = env.ADAPTIVE_CONTAINER_STORAGE_PATH;
    }
    if (env.ADAPTIVE_CONTAINER_LOG_LEVEL) {
      logging.level = env.ADAPTIVE_CONTAINER_LOG_LEVEL;
    }

    return { ...raw, storage, logging };
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (this.isRecord(incoming) && this.isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }

  private isRecord(value: unknown): value is RawConfig {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
