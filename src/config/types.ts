/**
 * Configuration Types
 * Type definitions for launcher configuration
 */

import { z } from 'zod';

// Log levels enum
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

// Log destinations enum
export enum LogDestination {
  CONSOLE = 'console',
  FILE = 'file'
}

// Configuration schema using Zod
export const LauncherConfigurationSchema = z.object({
  // Editor
  editorCommand: z.string().default('code')
    .describe('Editor executable used to open folders; arguments are ignored'),

  favoriteFolders: z.array(z.string()).default([])
    .describe('Saved folders that can be opened directly'),

  // Detection
  fileManagerClass: z.string().min(1).default('nautilus')
    .describe('Window class of the file manager'),

  toolTimeoutMs: z.number().int().positive().default(2000)
    .describe('Timeout for each external tool invocation in milliseconds'),

  focusTimeoutMs: z.number().int().positive().default(1000)
    .describe('Timeout for focused window and title lookups in milliseconds'),

  strategyTimeoutMs: z.number().int().positive().default(6000)
    .describe('Budget for a single detection strategy in milliseconds'),

  launchTimeoutMs: z.number().int().positive().default(3000)
    .describe('Time to wait for a launched editor to spawn in milliseconds'),

  // Logging Configuration
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO)
    .describe('Logging level'),

  logDestination: z.nativeEnum(LogDestination).default(LogDestination.CONSOLE)
    .describe('Log destination'),

  logFile: z.string().optional()
    .describe('Log file path (required when logDestination is "file")')
});

// TypeScript interface derived from schema
export type LauncherConfiguration = z.infer<typeof LauncherConfigurationSchema>;

// Values a config file or the environment may supply
export const PartialLauncherConfigurationSchema = LauncherConfigurationSchema.partial();
export type PartialLauncherConfiguration = z.infer<typeof PartialLauncherConfigurationSchema>;

// Environment variable mapping
export interface EnvironmentVariables {
  AFL_CONFIG_FILE?: string;
  AFL_EDITOR_COMMAND?: string;
  AFL_FAVORITE_FOLDERS?: string;
  AFL_FILE_MANAGER_CLASS?: string;
  AFL_TOOL_TIMEOUT?: string;
  AFL_FOCUS_TIMEOUT?: string;
  AFL_STRATEGY_TIMEOUT?: string;
  AFL_LAUNCH_TIMEOUT?: string;
  AFL_LOG_LEVEL?: string;
  AFL_LOG_DESTINATION?: string;
  AFL_LOG_FILE?: string;
}

// Configuration source priority
export enum ConfigSource {
  DEFAULT = 'default',
  CONFIG_FILE = 'config_file',
  ENVIRONMENT = 'environment',
  RUNTIME = 'runtime'
}

// Configuration with metadata
export interface ConfigurationWithMetadata {
  config: LauncherConfiguration;
  sources: Record<keyof LauncherConfiguration, ConfigSource>;
  configFile: string;
  configFileLoaded: boolean;
  errors: string[];
  warnings: string[];
}

export interface ConfigurationManagerOptions {
  /** Environment to read AFL_* variables from */
  env?: NodeJS.ProcessEnv;
  homeDirectory?: string;
  configFile?: string;
}
