import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { RteConfigSchema, type RteConfig } from './types.js';
import { ConfigError } from './errors.js';

export type ConfigOverrides = {
  sourceDirs?: string[];
  render?: Partial<RteConfig['render']>;
  logging?: Partial<RteConfig['logging']>;
};

export class ConfigManager {
  private config: RteConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir ?? join(homedir(), '.rte');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: ConfigOverrides): RteConfig {
    let raw: Record<string, unknown> = {};

    const globalConfigPath = join(this.globalDir, 'config.yaml');
    if (existsSync(globalConfigPath)) {
      raw = this.deepMerge(raw, this.readYaml(globalConfigPath, 'global'));
    }

    const projectConfigPath = join(this.projectDir, '.rte.yaml');
    if (existsSync(projectConfigPath)) {
      raw = this.deepMerge(raw, this.readYaml(projectConfigPath, 'project'));
    }

    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = RteConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error);
    }

    // Relative source directories are resolved against the project directory
    this.config = {
      ...parsed.data,
      sourceDirs: parsed.data.sourceDirs.map((dir) =>
        dir.startsWith('/') ? dir : join(this.projectDir, dir),
      ),
    };
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): RteConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  /**
   * Create a default project config if it doesn't exist
   */
  createDefaultConfig(): string {
    const configPath = join(this.projectDir, '.rte.yaml');
    if (!existsSync(configPath)) {
      mkdirSync(this.projectDir, { recursive: true });
      const defaultConfig = `# rte project configuration
# Directories searched for <module>.erl, relative to this file
sourceDirs:
  - src

render:
  indentUnit: " "
  indentWidth: 4
  banner: true

logging:
  level: info
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, scope: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${scope} config at ${path}`, err instanceof Error ? err : undefined);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Expected a mapping in ${scope} config at ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const result = { ...raw };

    if (process.env.RTE_SOURCE_DIRS) {
      result.sourceDirs = process.env.RTE_SOURCE_DIRS.split(':').filter(Boolean);
    }
    if (process.env.RTE_LOG_LEVEL) {
      const logging = isPlainObject(result.logging) ? result.logging : {};
      result.logging = { ...logging, level: process.env.RTE_LOG_LEVEL };
    }
    if (process.env.RTE_INDENT_UNIT) {
      const render = isPlainObject(result.render) ? result.render : {};
      result.render = { ...render, indentUnit: process.env.RTE_INDENT_UNIT };
    }

    return result;
  }

  private deepMerge(target: Record<string, unknown>, source: object): Record<string, unknown> {
    const result = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
