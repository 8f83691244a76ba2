/**
 * ConfigManager - Configuration management service
 *
 * Manages application configuration with loading, saving, validation,
 * and runtime modification.
 *
 * Priority (highest to lowest):
 * 1. Config file (~/.toolcast/config.json, or the path given to the constructor)
 * 2. Default values (DEFAULT_CONFIG)
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import type { Config, ConfigKey, ConfigValue } from '../types/index.js';
import { DEFAULT_CONFIG, isConfigKey, validateConfigValue } from '../config/defaults.js';
import { getConfigFile } from '../config/paths.js';
import { isFileNotFoundError } from '../utils/errorUtils.js';
import { logger } from './Logger.js';

function withValue(config: Config, key: ConfigKey, value: ConfigValue): Config {
  return { ...config, [key]: value };
}

function cloneDefaults(): Config {
  return { ...DEFAULT_CONFIG, rejection_messages: { ...DEFAULT_CONFIG.rejection_messages } };
}

export class ConfigManager {
  private _config: Config;
  private _configPath: string;

  constructor(configPath?: string) {
    this._configPath = configPath || getConfigFile();
    this._config = cloneDefaults();
  }

  /**
   * Load configuration from disk and apply the configured log level
   */
  async initialize(): Promise<void> {
    await this.loadConfig();
    logger.setLevelByName(this._config.log_level);
  }

  /**
   * Load configuration from disk
   *
   * Validates and coerces types during loading. Unknown keys and invalid
   * values are reported and fall back to the defaults.
   */
  private async loadConfig(): Promise<void> {
    let raw: unknown;
    try {
      const content = await fs.readFile(this._configPath, 'utf-8');
      raw = JSON.parse(content);
    } catch (error) {
      if (!isFileNotFoundError(error)) {
        logger.warn('[CONFIG] Error loading config, using defaults:', error);
      }
      this._config = cloneDefaults();
      return;
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      logger.warn(`[CONFIG] ${this._configPath} does not contain a JSON object, using defaults`);
      this._config = cloneDefaults();
      return;
    }

    let config = cloneDefaults();
    for (const [key, value] of Object.entries(raw)) {
      if (!isConfigKey(key)) {
        logger.warn(`[CONFIG] Unknown key '${key}' in config, ignoring`);
        continue;
      }
      const validated = validateConfigValue(key, value);
      if (validated.valid && validated.coercedValue !== undefined) {
        config = withValue(config, key, validated.coercedValue);
      } else {
        logger.warn(`[CONFIG] Invalid value for ${key}: ${validated.error}. Using default.`);
      }
    }
    this._config = config;
  }

  /**
   * Save configuration to disk
   *
   * Only values that differ from the defaults are written.
   */
  async saveConfig(): Promise<void> {
    try {
      await fs.mkdir(dirname(this._configPath), { recursive: true });

      const configToSave: Partial<Record<ConfigKey, ConfigValue>> = {};
      for (const key of this.getKeys()) {
        const value = this._config[key];
        if (JSON.stringify(value) !== JSON.stringify(DEFAULT_CONFIG[key])) {
          configToSave[key] = value;
        }
      }

      await fs.writeFile(this._configPath, JSON.stringify(configToSave, null, 2), 'utf-8');
      logger.debug('[CONFIG] Saved config');
    } catch (error) {
      logger.error('[CONFIG] Error saving config:', error);
      throw error;
    }
  }

  /**
   * Get the complete configuration object
   */
  getConfig(): Readonly<Config> {
    return { ...this._config };
  }

  getValue<K extends ConfigKey>(key: K): Config[K] {
    return this._config[key];
  }

  /**
   * Set a configuration value with validation and save
   *
   * @throws Error if validation fails
   */
  async setValue<K extends ConfigKey>(key: K, value: Config[K]): Promise<void> {
    const validation = validateConfigValue(key, value);

    if (!validation.valid || validation.coercedValue === undefined) {
      throw new Error(`Cannot set config value '${key}': ${validation.error}`);
    }

    this._config = withValue(this._config, key, validation.coercedValue);
    if (key === 'log_level') {
      logger.setLevelByName(this._config.log_level);
    }

    await this.saveConfig();
  }

  /**
   * Reset configuration to default values
   *
   * @returns Keys whose values changed
   */
  async reset(): Promise<ConfigKey[]> {
    const changed = this.getKeys().filter(
      key => JSON.stringify(this._config[key]) !== JSON.stringify(DEFAULT_CONFIG[key])
    );
    this._config = cloneDefaults();
    await this.saveConfig();
    return changed;
  }

  getKeys(): ConfigKey[] {
    return Object.keys(DEFAULT_CONFIG).filter(isConfigKey);
  }

  getConfigPath(): string {
    return this._configPath;
  }
}
