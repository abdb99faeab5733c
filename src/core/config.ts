import { join } from 'path';
import type { NumpkgConfig, NumpkgDirectories } from '../types/index.js';
import { readJsonOrJsoncFile, writeJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, getErrorMessage } from '../utils/errors.js';
import { isMapping } from '../utils/validation/mapping.js';
import { getNumpkgDirectories } from './directory.js';

/**
 * Configuration management for the numpkg CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'];
const DEFAULT_CONFIG_FILE = 'config.jsonc';

const STRING_KEYS = [
  'prefix',
  'archPrefix',
  'globalPrefix',
  'globalArchPrefix',
  'localList',
  'globalList',
  'indexUrl',
  'searchPathFile'
] as const;

function validateConfig(raw: unknown, configPath: string): NumpkgConfig {
  if (!isMapping(raw)) {
    throw new ConfigError(`Configuration in ${configPath} must be an object`);
  }

  const config: NumpkgConfig = {};
  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new ConfigError(`Configuration key '${key}' in ${configPath} must be a non-empty string`);
    }
    config[key] = value;
  }

  const testCommand = raw.testCommand;
  if (testCommand !== undefined) {
    if (!Array.isArray(testCommand) || testCommand.length === 0 || !testCommand.every(part => typeof part === 'string')) {
      throw new ConfigError(`Configuration key 'testCommand' in ${configPath} must be a non-empty list of strings`);
    }
    config.testCommand = testCommand;
  }

  return config;
}

class ConfigManager {
  private config: NumpkgConfig | null = null;
  private configPath: string | null = null;
  private numpkgDirs: NumpkgDirectories;

  constructor(dirs: NumpkgDirectories = getNumpkgDirectories()) {
    this.numpkgDirs = dirs;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.numpkgDirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  private async getConfigPath(): Promise<string> {
    if (this.configPath) {
      return this.configPath;
    }

    const existingPath = await this.findConfigFile();
    this.configPath = existingPath ?? join(this.numpkgDirs.config, DEFAULT_CONFIG_FILE);
    return this.configPath;
  }

  /**
   * Load configuration from file; a missing file means an empty configuration
   */
  async load(): Promise<NumpkgConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    this.configPath = configPath;
    try {
      this.config = validateConfig(await readJsonOrJsoncFile(configPath), configPath);
    } catch (error) {
      if (error instanceof ConfigError) throw error;
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${getErrorMessage(error)}`);
    }
    return this.config;
  }

  /**
   * Save current configuration to file
   */
  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }

    const configPath = await this.getConfigPath();
    try {
      logger.debug(`Saving config to: ${configPath}`);
      await writeJsoncFile(configPath, this.config);
    } catch (error) {
      logger.error('Failed to save configuration', { error, configPath });
      throw new ConfigError(`Failed to save configuration: ${getErrorMessage(error)}`);
    }
  }

  async get<K extends keyof NumpkgConfig>(key: K): Promise<NumpkgConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  async set<K extends keyof NumpkgConfig>(key: K, value: NumpkgConfig[K]): Promise<void> {
    const config = await this.load();
    config[key] = value;
    this.config = config;
    await this.save();
    logger.info(`Configuration updated: ${key} = ${String(value)}`);
  }

  async getAll(): Promise<NumpkgConfig> {
    return await this.load();
  }

  async getConfigFilePath(): Promise<string> {
    return await this.getConfigPath();
  }
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
