/**
 * ConfigurationManager Class
 * Centralized configuration management with multiple sources.
 * Also acts as the settings store: the editor command and favourite folders
 * are written back to the configuration file when they change.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  LauncherConfiguration,
  LauncherConfigurationSchema,
  PartialLauncherConfiguration,
  PartialLauncherConfigurationSchema,
  EnvironmentVariables,
  ConfigSource,
  ConfigurationWithMetadata,
  ConfigurationManagerOptions,
  LogLevel,
  LogDestination
} from './types';
import type { ValidatedPath } from '../types/index';
import { errorMessage } from '../errors/LauncherErrors';

export const CONFIG_DIRECTORY_NAME = 'active-folder-launcher';

export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;
  private configuration: ConfigurationWithMetadata;
  private readonly env: NodeJS.ProcessEnv;
  private readonly homeDir: string;
  private readonly explicitConfigFile: string | undefined;

  private constructor(options: ConfigurationManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.homeDir = options.homeDirectory ?? os.homedir();
    this.explicitConfigFile = options.configFile;
    this.configuration = this.loadConfiguration();
  }

  /**
   * Get singleton instance
   */
  public static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Create a standalone manager, bypassing the singleton
   */
  public static create(options: ConfigurationManagerOptions = {}): ConfigurationManager {
    return new ConfigurationManager(options);
  }

  /**
   * Drop the singleton (tests)
   */
  public static resetInstance(): void {
    ConfigurationManager.instance = undefined;
  }

  /**
   * Get current configuration
   */
  public getConfiguration(): LauncherConfiguration {
    return this.configuration.config;
  }

  /**
   * Get configuration with metadata
   */
  public getConfigurationWithMetadata(): ConfigurationWithMetadata {
    return this.configuration;
  }

  /**
   * Reload configuration from all sources
   */
  public reloadConfiguration(): ConfigurationWithMetadata {
    this.configuration = this.loadConfiguration();
    return this.configuration;
  }

  public getConfigFilePath(): string {
    return this.configuration.configFile;
  }

  public getEditorCommand(): string {
    return this.configuration.config.editorCommand;
  }

  /**
   * Persist a new editor command, e.g. after a fallback editor launched successfully
   */
  public setEditorCommand(command: string): boolean {
    this.applyRuntimeValue({ editorCommand: command });
    return this.persist();
  }

  public getFavoriteFolders(): string[] {
    return [...this.configuration.config.favoriteFolders];
  }

  /**
   * Add a favourite folder. Returns false when it was already present or could not be saved.
   */
  public addFavoriteFolder(folder: ValidatedPath): boolean {
    const favorites = this.configuration.config.favoriteFolders;
    if (favorites.includes(folder.path)) {
      return false;
    }
    this.applyRuntimeValue({ favoriteFolders: [...favorites, folder.path] });
    return this.persist();
  }

  public removeFavoriteFolder(folderPath: string): boolean {
    const favorites = this.configuration.config.favoriteFolders;
    if (!favorites.includes(folderPath)) {
      return false;
    }
    this.applyRuntimeValue({ favoriteFolders: favorites.filter(entry => entry !== folderPath) });
    return this.persist();
  }

  /**
   * Load configuration from all sources with priority
   */
  private loadConfiguration(): ConfigurationWithMetadata {
    const errors: string[] = [];
    const warnings: string[] = [];
    const sources = this.createDefaultSources();

    // Start with default configuration
    let config = LauncherConfigurationSchema.parse({});

    const configFile = this.resolveConfigFilePath();

    // 1. Load from configuration file
    const fileResult = this.loadFromConfigFile(configFile);
    if (fileResult.config) {
      config = this.mergeConfigurations(config, fileResult.config, sources, ConfigSource.CONFIG_FILE);
    }
    errors.push(...fileResult.errors);
    warnings.push(...fileResult.warnings);

    // 2. Load from environment variables
    const envResult = this.loadFromEnvironment();
    if (envResult.config) {
      config = this.mergeConfigurations(config, envResult.config, sources, ConfigSource.ENVIRONMENT);
    }
    errors.push(...envResult.errors);
    warnings.push(...envResult.warnings);

    // 3. Post-process configuration
    const processed = this.postProcessConfiguration(config);
    errors.push(...processed.errors);
    warnings.push(...processed.warnings);

    return {
      config: processed.config,
      sources,
      configFile,
      configFileLoaded: fileResult.config !== null,
      errors,
      warnings
    };
  }

  private resolveConfigFilePath(): string {
    const env: EnvironmentVariables = this.env;
    const fromEnv = env.AFL_CONFIG_FILE;
    const configured = this.explicitConfigFile ?? fromEnv;
    if (configured && configured.trim().length > 0) {
      return this.expandHome(configured.trim());
    }
    return path.join(this.homeDir, '.config', CONFIG_DIRECTORY_NAME, 'config.json');
  }

  /**
   * Load configuration from the JSON file, keeping every key that validates
   */
  private loadFromConfigFile(configFile: string): {
    config: PartialLauncherConfiguration | null;
    errors: string[];
    warnings: string[];
  } {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!fs.existsSync(configFile)) {
      return { config: null, errors, warnings };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(configFile, 'utf8'));
    } catch (error) {
      errors.push(`Failed to load config file ${configFile}: ${errorMessage(error)}`);
      return { config: null, errors, warnings };
    }

    if (!this.isPlainObject(raw)) {
      errors.push(`Config file ${configFile} must contain a JSON object`);
      return { config: null, errors, warnings };
    }

    const accepted: Record<string, unknown> = {};
    for (const [key, schema] of Object.entries(LauncherConfigurationSchema.shape)) {
      if (!(key in raw)) {
        continue;
      }
      const result = schema.safeParse(raw[key]);
      if (result.success) {
        accepted[key] = result.data;
      } else {
        warnings.push(`Invalid value for ${key} in ${configFile}, using default`);
      }
    }

    return {
      config: PartialLauncherConfigurationSchema.parse(accepted),
      errors,
      warnings
    };
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnvironment(): {
    config: PartialLauncherConfiguration | null;
    errors: string[];
    warnings: string[];
  } {
    const errors: string[] = [];
    const warnings: string[] = [];
    const env: EnvironmentVariables = this.env;
    const config: PartialLauncherConfiguration = {};

    if (env.AFL_EDITOR_COMMAND) {
      config.editorCommand = env.AFL_EDITOR_COMMAND.trim();
    }

    if (env.AFL_FAVORITE_FOLDERS) {
      config.favoriteFolders = env.AFL_FAVORITE_FOLDERS.split(',')
        .map(folder => folder.trim())
        .filter(folder => folder.length > 0);
    }

    if (env.AFL_FILE_MANAGER_CLASS) {
      config.fileManagerClass = env.AFL_FILE_MANAGER_CLASS.trim();
    }

    // Parse log level
    if (env.AFL_LOG_LEVEL) {
      const level = Object.values(LogLevel).find(value => value === env.AFL_LOG_LEVEL);
      if (level) {
        config.logLevel = level;
      } else {
        errors.push(`Invalid log level: ${env.AFL_LOG_LEVEL}`);
      }
    }

    // Parse log destination
    if (env.AFL_LOG_DESTINATION) {
      const destination = Object.values(LogDestination).find(value => value === env.AFL_LOG_DESTINATION);
      if (destination) {
        config.logDestination = destination;
      } else {
        errors.push(`Invalid log destination: ${env.AFL_LOG_DESTINATION}`);
      }
    }

    if (env.AFL_LOG_FILE) {
      config.logFile = env.AFL_LOG_FILE;
    }

    // Parse numeric options
    const timeouts: Array<[string | undefined, 'toolTimeoutMs' | 'focusTimeoutMs' | 'strategyTimeoutMs' | 'launchTimeoutMs', string]> = [
      [env.AFL_TOOL_TIMEOUT, 'toolTimeoutMs', 'tool timeout'],
      [env.AFL_FOCUS_TIMEOUT, 'focusTimeoutMs', 'focus timeout'],
      [env.AFL_STRATEGY_TIMEOUT, 'strategyTimeoutMs', 'strategy timeout'],
      [env.AFL_LAUNCH_TIMEOUT, 'launchTimeoutMs', 'launch timeout']
    ];

    for (const [rawValue, key, label] of timeouts) {
      if (!rawValue) {
        continue;
      }
      const value = parseInt(rawValue, 10);
      if (!isNaN(value) && value > 0) {
        config[key] = value;
      } else {
        errors.push(`Invalid ${label}: ${rawValue}`);
      }
    }

    return {
      config: Object.keys(config).length > 0 ? config : null,
      errors,
      warnings
    };
  }

  /**
   * Merge configurations with source tracking
   */
  private mergeConfigurations(
    base: LauncherConfiguration,
    override: PartialLauncherConfiguration,
    sources: Record<keyof LauncherConfiguration, ConfigSource>,
    source: ConfigSource
  ): LauncherConfiguration {
    for (const key of Object.keys(override)) {
      if (this.isConfigKey(key) && override[key] !== undefined) {
        sources[key] = source;
      }
    }

    return { ...base, ...override };
  }

  /**
   * Post-process configuration (expand paths, validate combinations, etc.)
   */
  private postProcessConfiguration(config: LauncherConfiguration): {
    config: LauncherConfiguration;
    errors: string[];
    warnings: string[];
  } {
    const errors: string[] = [];
    const warnings: string[] = [];
    const processedConfig = { ...config };

    processedConfig.favoriteFolders = processedConfig.favoriteFolders.map(dir => this.expandHome(dir));

    if (processedConfig.logFile) {
      processedConfig.logFile = this.expandHome(processedConfig.logFile);
    }

    // Validate log file requirement
    if (processedConfig.logDestination === LogDestination.FILE && !processedConfig.logFile) {
      errors.push('Log file path is required when log destination is "file"');
      processedConfig.logDestination = LogDestination.CONSOLE;
    }

    if (processedConfig.editorCommand.trim().includes(' ')) {
      warnings.push(`Editor command arguments are ignored: ${processedConfig.editorCommand}`);
    }

    if (processedConfig.strategyTimeoutMs < processedConfig.toolTimeoutMs) {
      warnings.push('Strategy timeout is shorter than the tool timeout; slow tools will be cut off');
    }

    return {
      config: processedConfig,
      errors,
      warnings
    };
  }

  private applyRuntimeValue(values: PartialLauncherConfiguration): void {
    this.configuration.config = this.mergeConfigurations(
      this.configuration.config,
      values,
      this.configuration.sources,
      ConfigSource.RUNTIME
    );
  }

  /**
   * Write the persisted settings back to the configuration file.
   * Unknown keys already in the file are preserved.
   */
  private persist(): boolean {
    const configFile = this.configuration.configFile;

    try {
      let existing: Record<string, unknown> = {};
      if (fs.existsSync(configFile)) {
        const parsed: unknown = JSON.parse(fs.readFileSync(configFile, 'utf8'));
        if (this.isPlainObject(parsed)) {
          existing = parsed;
        }
      }

      const next = {
        ...existing,
        editorCommand: this.configuration.config.editorCommand,
        favoriteFolders: this.configuration.config.favoriteFolders
      };

      fs.mkdirSync(path.dirname(configFile), { recursive: true, mode: 0o700 });
      fs.writeFileSync(configFile, JSON.stringify(next, null, 2), 'utf8');
      return true;
    } catch (error) {
      this.configuration.errors.push(
        `Failed to save config file ${configFile}: ${errorMessage(error)}`
      );
      return false;
    }
  }

  private createDefaultSources(): Record<keyof LauncherConfiguration, ConfigSource> {
    return {
      editorCommand: ConfigSource.DEFAULT,
      favoriteFolders: ConfigSource.DEFAULT,
      fileManagerClass: ConfigSource.DEFAULT,
      toolTimeoutMs: ConfigSource.DEFAULT,
      focusTimeoutMs: ConfigSource.DEFAULT,
      strategyTimeoutMs: ConfigSource.DEFAULT,
      launchTimeoutMs: ConfigSource.DEFAULT,
      logLevel: ConfigSource.DEFAULT,
      logDestination: ConfigSource.DEFAULT,
      logFile: ConfigSource.DEFAULT
    };
  }

  private isConfigKey(key: string): key is keyof LauncherConfiguration {
    return key in LauncherConfigurationSchema.shape;
  }

  private isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private expandHome(target: string): string {
    if (target === '~') {
      return this.homeDir;
    }
    if (target.startsWith('~/')) {
      return path.join(this.homeDir, target.slice(2));
    }
    return path.resolve(target);
  }
}
