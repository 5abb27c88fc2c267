import { join } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { ZodError } from 'zod';
import { CodewayConfigSchema, type CodewayConfig, type SettableConfigKey } from './types.js';
import { ConfigError } from './errors.js';
import { getGlobalDir } from '../utils/platform.js';
import { readFileSafe, writeFileSafe } from '../utils/fs.js';

export class ConfigManager {
  private config: Readonly<CodewayConfig> | null = null;
  private globalDir: string;

  constructor(globalDir?: string) {
    this.globalDir = globalDir || getGlobalDir();
  }

  /**
   * Load configuration, merged in order: defaults <- config file <- env vars.
   * The result is frozen; callers pass it on explicitly.
   */
  load(env: NodeJS.ProcessEnv = process.env): Readonly<CodewayConfig> {
    const raw = this.applyEnvVars(this.readRaw(), env);

    let parsed: CodewayConfig;
    try {
      parsed = CodewayConfigSchema.parse(raw);
    } catch (err) {
      const detail = err instanceof ZodError
        ? err.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        : String(err);
      throw new ConfigError(
        `Invalid configuration in ${this.getConfigPath()}: ${detail}. Fix or delete the file and retry.`,
        err instanceof Error ? err : undefined,
      );
    }

    Object.freeze(parsed.sync);
    this.config = Object.freeze(parsed);
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): Readonly<CodewayConfig> {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getConfigPath(): string {
    return join(this.globalDir, 'config.yaml');
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  /**
   * Persist a single key, keeping every other key in the file as it is.
   */
  set(key: SettableConfigKey, value: string): void {
    const raw = { ...this.readRaw(), [key]: value };

    const result = CodewayConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(
        `Refusing to write ${key}: ${result.error.issues.map(i => i.message).join('; ')}`,
      );
    }

    writeFileSafe(this.getConfigPath(), stringifyYaml(raw));
    this.config = null;
  }

  private readRaw(): Record<string, unknown> {
    const configPath = this.getConfigPath();
    const content = readFileSafe(configPath);
    if (content === null) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(content);
    } catch (err) {
      throw new ConfigError(
        `Failed to parse config at ${configPath}. Fix the YAML or delete the file and retry.`,
        err instanceof Error ? err : undefined,
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigError(
        `Config at ${configPath} must be a mapping of keys to values. Fix or delete the file and retry.`,
      );
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private applyEnvVars(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
    const result = { ...raw };
    if (env.CODEWAY_DEFAULT_COMMAND) {
      result.defaultCommand = env.CODEWAY_DEFAULT_COMMAND;
    }
    if (env.CODEWAY_DEFAULT_REPO) {
      result.defaultRepo = env.CODEWAY_DEFAULT_REPO;
    }
    return result;
  }
}
