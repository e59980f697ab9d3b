import { readFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { ThoughtlineConfigSchema, type ThoughtlineConfig } from './types.js';
import { ConfigError, toError } from './errors.js';

export type ConfigOverrides = { [key: string]: unknown };

export class ConfigManager {
  private config: ThoughtlineConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, options: { globalDir?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.thoughtline');
    this.projectDir = projectDir || process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ConfigOverrides): ThoughtlineConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.thoughtline.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = ThoughtlineConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): ThoughtlineConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  /**
   * Database location: explicit setting, or thoughtline.db under the global dir.
   */
  resolveStoragePath(config: ThoughtlineConfig = this.get()): string {
    if (config.storage.path) return config.storage.path;
    if (!existsSync(this.globalDir)) {
      mkdirSync(this.globalDir, { recursive: true });
    }
    return join(this.globalDir, 'thoughtline.db');
  }

  private readYaml(path: string, scope: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${scope} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const fromEnv: Record<string, Record<string, unknown>> = {};

    if (this.env.THOUGHTLINE_DB_PATH) {
      fromEnv.storage = { path: this.env.THOUGHTLINE_DB_PATH };
    }
    if (this.env.THOUGHTLINE_LOG_LEVEL) {
      fromEnv.logging = { level: this.env.THOUGHTLINE_LOG_LEVEL };
    }
    const oracle: Record<string, unknown> = {};
    if (this.env.THOUGHTLINE_ORACLE_TIMEOUT_MS) {
      const timeout = Number(this.env.THOUGHTLINE_ORACLE_TIMEOUT_MS);
      if (!Number.isFinite(timeout)) {
        throw new ConfigError(`THOUGHTLINE_ORACLE_TIMEOUT_MS is not a number: ${this.env.THOUGHTLINE_ORACLE_TIMEOUT_MS}`);
      }
      oracle.timeoutMs = timeout;
    }
    if (this.env.OPENAI_API_KEY) {
      oracle.apiKey = this.env.OPENAI_API_KEY;
    }
    if (Object.keys(oracle).length > 0) {
      fromEnv.oracle = oracle;
    }

    return this.deepMerge(raw, fromEnv);
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
