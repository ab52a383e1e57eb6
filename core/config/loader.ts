import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { CheckConfig, ResolvedCheckConfig, TranslatorConfig, TablesConfig } from './types';
import { DEFAULT_CONFIG } from './types';
import { ConfigurationError } from '@core/errors/ConfigurationError';
import { configLogger } from '@core/utils/logger';

export interface ConfigLoaderOptions {
  /** Override for ~/.config/brl-check.json */
  globalConfigPath?: string;
  /** Environment consulted for overrides; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load checker configuration from both global and project locations
 */
export class ConfigLoader {
  private readonly globalConfigPath: string;
  private readonly projectConfigPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private cachedConfig?: ResolvedCheckConfig;

  constructor(projectPath?: string, options: ConfigLoaderOptions = {}) {
    // Global config location: ~/.config/brl-check.json
    this.globalConfigPath = options.globalConfigPath
      ?? path.join(os.homedir(), '.config', 'brl-check.json');

    // Project config location: <project>/brl-check.config.json
    this.projectConfigPath = path.join(projectPath ?? process.cwd(), 'brl-check.config.json');
    this.env = options.env ?? process.env;
  }

  /**
   * Load, merge and resolve configurations
   */
  load(): ResolvedCheckConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global
    const merged = this.mergeConfigs(globalConfig, projectConfig);
    this.cachedConfig = this.resolve(merged);
    configLogger.debug('Resolved configuration', { config: this.cachedConfig });

    return this.cachedConfig;
  }

  /**
   * Load a single config file
   */
  private loadConfigFile(filePath: string): CheckConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError('file is not valid JSON', filePath, error);
    }

    configLogger.debug(`Loaded config from ${filePath}`);
    return this.validate(parsed, filePath);
  }

  private validate(value: unknown, filePath: string): CheckConfig {
    if (!isRecord(value)) {
      throw new ConfigurationError('expected a JSON object', filePath);
    }

    const config: CheckConfig = {};

    if (value.translator !== undefined) {
      config.translator = this.validateTranslator(value.translator, filePath);
    }

    if (value.tables !== undefined) {
      config.tables = this.validateTables(value.tables, filePath);
    }

    return config;
  }

  private validateTranslator(value: unknown, filePath: string): TranslatorConfig {
    if (!isRecord(value)) {
      throw new ConfigurationError('"translator" must be an object', filePath);
    }

    const translator: TranslatorConfig = {};
    const { command, args, tablePath, timeout } = value;

    if (command !== undefined) {
      if (typeof command !== 'string' || command.length === 0) {
        throw new ConfigurationError('"translator.command" must be a non-empty string', filePath);
      }
      translator.command = command;
    }

    if (args !== undefined) {
      if (!Array.isArray(args) || !args.every((arg): arg is string => typeof arg === 'string')) {
        throw new ConfigurationError('"translator.args" must be an array of strings', filePath);
      }
      translator.args = args;
    }

    if (tablePath !== undefined) {
      if (typeof tablePath !== 'string') {
        throw new ConfigurationError('"translator.tablePath" must be a string', filePath);
      }
      translator.tablePath = tablePath;
    }

    if (timeout !== undefined) {
      if (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout <= 0) {
        throw new ConfigurationError('"translator.timeout" must be a positive integer', filePath);
      }
      translator.timeout = timeout;
    }

    return translator;
  }

  private validateTables(value: unknown, filePath: string): TablesConfig {
    if (!isRecord(value)) {
      throw new ConfigurationError('"tables" must be an object', filePath);
    }

    const tables: TablesConfig = {};
    const { maxListBytes } = value;

    if (maxListBytes !== undefined) {
      if (typeof maxListBytes !== 'number' || !Number.isInteger(maxListBytes) || maxListBytes <= 0) {
        throw new ConfigurationError('"tables.maxListBytes" must be a positive integer', filePath);
      }
      tables.maxListBytes = maxListBytes;
    }

    return tables;
  }

  /**
   * Merge two config objects; project values replace global ones key by key
   */
  private mergeConfigs(global: CheckConfig, project: CheckConfig): CheckConfig {
    const merged: CheckConfig = {};

    if (global.translator || project.translator) {
      merged.translator = { ...global.translator, ...project.translator };
    }

    if (global.tables || project.tables) {
      merged.tables = { ...global.tables, ...project.tables };
    }

    return merged;
  }

  /**
   * Fill defaults and apply environment overrides
   */
  private resolve(config: CheckConfig): ResolvedCheckConfig {
    const translator = config.translator ?? {};
    const command = this.env.BRL_CHECK_TRANSLATOR || translator.command || DEFAULT_CONFIG.translator.command;
    const tablePath = this.env.LOUIS_TABLEPATH || translator.tablePath;

    return {
      translator: {
        command,
        args: translator.args ?? [...DEFAULT_CONFIG.translator.args],
        ...(tablePath ? { tablePath } : {}),
        timeout: translator.timeout ?? DEFAULT_CONFIG.translator.timeout
      },
      tables: {
        maxListBytes: config.tables?.maxListBytes ?? DEFAULT_CONFIG.tables.maxListBytes
      }
    };
  }
}
