import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type DocsConfig,
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  docsConfigSchema,
  ConfigError,
} from '@lla-docs/shared';

export interface ConfigOverrides {
  pluginsDir?: string;
  outputFile?: string;
  repositoryUrl?: string;
  sortDirectories?: boolean;
  readmeLinks?: boolean;
  logLevel?: DocsConfig['logging']['level'];
}

export interface LoadOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private source: string | null = null;

  async load(options: LoadOptions = {}): Promise<DocsConfig> {
    const cwd = options.cwd ?? process.cwd();
    this.source = null;

    // 1. Start with defaults
    let merged: Record<string, unknown> = { ...DEFAULT_CONFIG, logging: { ...DEFAULT_CONFIG.logging } };

    // 2. Load config file
    const fileConfig = await this.loadConfigFile(cwd, options.configPath);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Environment variables, then CLI flags
    merged = deepMerge(merged, loadEnvVars(options.env ?? process.env));
    if (options.overrides) {
      merged = deepMerge(merged, fromOverrides(options.overrides));
    }

    // 4. Validate
    const result = docsConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      );
    }

    return {
      ...result.data,
      pluginsDir: resolve(cwd, result.data.pluginsDir),
      outputFile: resolve(cwd, result.data.outputFile),
    };
  }

  /** Path of the config file the last load() read, if any. */
  getSource(): string | null {
    return this.source;
  }

  private async loadConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown> | null> {
    if (configPath) {
      const p = resolve(cwd, configPath);
      if (!existsSync(p)) {
        throw new ConfigError(`Config file not found: ${p}`);
      }
      return this.parseConfigFile(p);
    }

    // Search cwd and parent directories
    let dir = resolve(cwd);
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break;
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
      throw new ConfigError(`Cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    // An empty YAML file parses to null
    if (parsed === null || parsed === undefined) {
      parsed = {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping`);
    }
    this.source = p;
    return parsed;
  }
}

function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env.LLA_DOCS_PLUGINS_DIR) {
    config.pluginsDir = env.LLA_DOCS_PLUGINS_DIR;
  }
  if (env.LLA_DOCS_OUTPUT) {
    config.outputFile = env.LLA_DOCS_OUTPUT;
  }
  if (env.LLA_DOCS_REPOSITORY_URL) {
    config.repositoryUrl = env.LLA_DOCS_REPOSITORY_URL;
  }
  if (env.LLA_DOCS_LOG_LEVEL) {
    config.logging = { level: env.LLA_DOCS_LOG_LEVEL };
  }

  return config;
}

function fromOverrides(overrides: ConfigOverrides): Record<string, unknown> {
  const { logLevel, ...rest } = overrides;
  const config: Record<string, unknown> = { ...rest };
  if (logLevel) {
    config.logging = { level: logLevel };
  }
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const next = source[key];
    const current = target[key];
    if (next === undefined) continue;
    if (isRecord(next) && isRecord(current)) {
      result[key] = deepMerge(current, next);
    } else {
      result[key] = next;
    }
  }
  return result;
}
