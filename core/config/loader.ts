import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { fileURLToPath } from 'url';
import { ConfigError } from '@core/errors';
import { configLogger } from '@core/utils/logger';
import { evalConfigSchema } from './schema';
import type { EvalConfig, EvaluatorSettings } from './types';

export const GLOBAL_CONFIG_FILE = 'evalconf.json';
export const PROJECT_CONFIG_FILE = 'evalconf.config.json';

/**
 * Load evalconf configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: EvalConfig;

  constructor(projectPath?: string, homeDir: string = os.homedir()) {
    // Global config location: ~/.config/evalconf.json
    this.globalConfigPath = path.join(homeDir, '.config', GLOBAL_CONFIG_FILE);

    // Project config location: <project>/evalconf.config.json
    this.projectConfigPath = path.join(projectPath ?? process.cwd(), PROJECT_CONFIG_FILE);
  }

  /**
   * Load and merge configurations (project overrides global)
   */
  load(): EvalConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * Load a single config file. A missing file is an empty config; an
   * unreadable or invalid one is a ConfigError.
   */
  private loadConfigFile(filePath: string): EvalConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Failed to read config from ${filePath}`, { filePath, cause: error });
    }

    const parsed = evalConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const problems = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config in ${filePath}: ${problems}`, { filePath, cause: parsed.error });
    }

    configLogger.debug('Loaded config file', { filePath });
    return parsed.data;
  }

  private mergeConfigs(global: EvalConfig, project: EvalConfig): EvalConfig {
    const merged: EvalConfig = { ...global, ...project };

    // Arrays merge (project adds to global)
    if (global.classpath || project.classpath) {
      merged.classpath = [
        ...(global.classpath ?? []),
        ...(project.classpath ?? [])
      ];
    }

    return merged;
  }
}

/**
 * Split a delimiter-separated classpath, turning `file:` URLs into paths.
 */
export function parseClasspathList(value: string, delimiter: string = path.delimiter): string[] {
  return value
    .split(delimiter)
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => (entry.startsWith('file:') ? fileURLToPath(entry) : entry));
}

/**
 * Environment overrides, applied on top of file configuration.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): EvalConfig {
  const config: EvalConfig = {};

  if (env.EVALCONF_TMPDIR) {
    config.tmpDir = env.EVALCONF_TMPDIR;
  }
  if (env.EVALCONF_CLASSPATH) {
    config.classpath = parseClasspathList(env.EVALCONF_CLASSPATH);
  }

  const retention = env.EVALCONF_OUTPUT_RETENTION;
  if (retention !== undefined) {
    if (retention !== 'retain' && retention !== 'delete') {
      throw new ConfigError(`EVALCONF_OUTPUT_RETENTION must be "retain" or "delete", got "${retention}"`);
    }
    config.outputRetention = retention;
  }

  const naming = env.EVALCONF_NAMING;
  if (naming !== undefined) {
    if (naming !== 'unique' && naming !== 'fixed') {
      throw new ConfigError(`EVALCONF_NAMING must be "unique" or "fixed", got "${naming}"`);
    }
    config.naming = naming;
  }

  return config;
}

/**
 * Apply defaults. Later layers win; classpath entries accumulate in layer order.
 */
export function resolveSettings(...layers: EvalConfig[]): EvaluatorSettings {
  const merged: EvalConfig = {};
  const classpath: string[] = [];

  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined && key !== 'classpath') {
        Object.assign(merged, { [key]: value });
      }
    }
    if (layer.classpath) {
      classpath.push(...layer.classpath);
    }
  }

  return {
    tmpDir: merged.tmpDir ?? os.tmpdir(),
    outputRetention: merged.outputRetention ?? 'retain',
    naming: merged.naming ?? 'unique',
    unitPrefix: merged.unitPrefix ?? 'Evaluator',
    classpath,
    typeCheck: merged.typeCheck ?? true,
    strict: merged.strict ?? true,
    deprecationWarnings: merged.deprecationWarnings ?? true,
    isolation: merged.isolation ?? 'host',
    evaluationErrors: merged.evaluationErrors ?? 'propagate'
  };
}
