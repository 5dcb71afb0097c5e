/**
 * ResolutionService Class
 * Pairs the resolved folder with an authorized editor command. Performs no
 * process launching; callers hand the validated values to a launcher.
 */

import * as path from 'path';
import type {
  DetectionAttempt,
  ValidatedCommand,
  ValidatedPath
} from '../types/index';
import { LocationResolver } from './LocationResolver';
import { PathValidator } from '../security/PathValidator';
import { CommandValidator } from '../security/CommandValidator';
import {
  InvalidPathError,
  NoDirectoryDetectedError,
  NoEditorAvailableError
} from '../errors/LauncherErrors';
import { Logger } from '../logging/Logger';

/**
 * Well-known editor locations tried, in this order, after the configured command
 */
export const FALLBACK_EDITORS: readonly string[] = [
  'code',
  'code-insiders',
  'codium',
  'vscodium',
  '/usr/bin/code',
  '/usr/local/bin/code',
  '/snap/bin/code',
  '/var/lib/flatpak/app/com.visualstudio.code/current/active/export/bin/com.visualstudio.code',
  '/opt/visual-studio-code/bin/code',
  '~/.local/bin/code'
];

export interface AuthorizedEditors {
  commands: ValidatedCommand[];
  /** Every setting that was tried, in order */
  attempted: string[];
}

export interface AuthorizedLaunch {
  directory: ValidatedPath;
  /** Preferred command first, then validated fallbacks */
  commands: ValidatedCommand[];
  /** True when every preferred setting was rejected */
  usedFallback: boolean;
  attempts: DetectionAttempt[];
}

export interface ResolutionServiceOptions {
  resolver: LocationResolver;
  pathValidator: PathValidator;
  commandValidator: CommandValidator;
  fallbackEditors?: readonly string[];
  logger?: Logger;
}

export class ResolutionService {
  private readonly resolver: LocationResolver;
  private readonly pathValidator: PathValidator;
  private readonly commandValidator: CommandValidator;
  private readonly fallbackEditors: readonly string[];
  private readonly logger: Logger;
  private currentDirectory: ValidatedPath | null = null;
  private generation = 0;

  constructor(options: ResolutionServiceOptions) {
    this.resolver = options.resolver;
    this.pathValidator = options.pathValidator;
    this.commandValidator = options.commandValidator;
    this.fallbackEditors = options.fallbackEditors ?? FALLBACK_EDITORS;
    this.logger = options.logger ?? Logger.createDefault('ResolutionService');
  }

  /**
   * @throws NoDirectoryDetectedError when every strategy fails
   * @throws NoEditorAvailableError when neither the settings nor any fallback validates
   */
  public async resolveAndAuthorize(editorSettings: string | readonly string[]): Promise<AuthorizedLaunch> {
    const { directory, attempts } = await this.detect();
    if (!directory) {
      throw new NoDirectoryDetectedError();
    }

    const preferred = toSettingList(editorSettings);
    const { commands, attempted } = this.authorizeEditors(preferred);
    if (commands.length === 0) {
      throw new NoEditorAvailableError(attempted);
    }

    return {
      directory,
      commands,
      usedFallback: !preferred.some(setting => setting === commands[0]?.source),
      attempts
    };
  }

  /**
   * Runs the resolver and records the result as the current directory. Only the
   * most recent trigger may overwrite it.
   */
  public async detect(): Promise<{ directory: ValidatedPath | null; attempts: DetectionAttempt[] }> {
    const ticket = ++this.generation;
    const report = await this.resolver.resolveWithDiagnostics();

    if (ticket === this.generation) {
      this.currentDirectory = report.directory;
    }
    return report;
  }

  /**
   * Validates the preferred settings in order (an explicit choice, then the
   * configured one) and then the fallback list, skipping entries that resolve
   * to an executable already accepted.
   */
  public authorizeEditors(editorSettings: string | readonly string[]): AuthorizedEditors {
    const commands: ValidatedCommand[] = [];
    const attempted: string[] = [];
    const seen = new Set<string>();

    const home = this.pathValidator.getHomeDirectory();
    const settings = [...toSettingList(editorSettings), ...this.fallbackEditors.map(entry => expandHome(entry, home))];

    for (const setting of settings) {
      if (attempted.includes(setting)) {
        continue;
      }
      attempted.push(setting);

      const result = this.commandValidator.validateCommand(setting);
      if (!result.isValid) {
        this.logger.debug(`Editor candidate rejected: ${setting}`, { error: result.error });
        continue;
      }

      if (seen.has(result.validated.path)) {
        continue;
      }
      seen.add(result.validated.path);
      commands.push(result.validated);
    }

    return { commands, attempted };
  }

  /**
   * @throws InvalidPathError when the folder fails validation
   */
  public authorizeDirectory(candidate: string): ValidatedPath {
    const result = this.pathValidator.validateDirectory(candidate);
    if (!result.isValid) {
      throw new InvalidPathError(candidate, result.error);
    }
    return result.validated;
  }

  public getCurrentDirectory(): ValidatedPath | null {
    return this.currentDirectory;
  }

  public getResolver(): LocationResolver {
    return this.resolver;
  }
}

function toSettingList(editorSettings: string | readonly string[]): readonly string[] {
  return typeof editorSettings === 'string' ? [editorSettings] : editorSettings;
}

function expandHome(entry: string, home: string): string {
  return entry.startsWith('~/') ? path.join(home, entry.slice(2)) : entry;
}
