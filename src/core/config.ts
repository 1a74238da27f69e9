import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { GeneratorConfigSchema, LOG_LEVELS, type GeneratorConfig, type GeneratorConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.kernelgen.yaml';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is GeneratorConfig['logLevel'] {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class ConfigManager {
  private config: GeneratorConfig | null = null;
  private projectDir: string;

  constructor(projectDir?: string, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- project (or explicit) config file <- env vars <- overrides
   */
  load(overrides?: GeneratorConfigInput, configPath?: string): GeneratorConfig {
    let raw: RawConfig = {};

    const filePath = configPath ? resolve(this.projectDir, configPath) : join(this.projectDir, PROJECT_CONFIG_FILE);
    if (configPath && !existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    if (existsSync(filePath)) {
      let parsed: unknown;
      try {
        parsed = parseYaml(readFileSync(filePath, 'utf-8'));
      } catch (err) {
        throw new ConfigError(`Failed to parse config at ${filePath}`, toError(err));
      }
      if (isRecord(parsed)) {
        raw = this.deepMerge(raw, parsed);
      }
    }

    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const result = GeneratorConfigSchema.safeParse(raw);
    if (!result.success) {
      const detail = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  get(): GeneratorConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const result = { ...raw };

    const sourceDir = this.env.KERNELGEN_SOURCE_DIR;
    if (sourceDir) {
      const paths = isRecord(result.paths) ? { ...result.paths } : {};
      paths.sourceDir = sourceDir;
      result.paths = paths;
    }

    const level = this.env.KERNELGEN_LOG_LEVEL?.toLowerCase();
    if (level) {
      if (!isLogLevel(level)) {
        throw new ConfigError(`KERNELGEN_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${level}"`);
      }
      result.logLevel = level;
    }

    return result;
  }

  private deepMerge(target: RawConfig, source: object): RawConfig {
    const result: RawConfig = { ...target };
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) continue;
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
