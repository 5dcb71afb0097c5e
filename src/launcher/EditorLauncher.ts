/**
 * EditorLauncher Class
 * Opens a folder in the first authorized editor that actually starts, and
 * remembers a working fallback so later launches skip the search.
 */

import type {
  EditorProcessLauncher,
  LaunchFailureReason,
  ValidatedCommand,
  ValidatedPath
} from '../types/index';
import { ResolutionService } from '../resolution/ResolutionService';
import { NoEditorAvailableError } from '../errors/LauncherErrors';
import { Logger } from '../logging/Logger';

/**
 * Where the editor setting is read from and a working fallback written to
 */
export interface EditorSettingsStore {
  getEditorCommand(): string;
  setEditorCommand(command: string): boolean;
}

export interface LaunchFailure {
  command: string;
  reason: LaunchFailureReason;
}

export interface OpenFolderResult {
  directory: ValidatedPath;
  command: ValidatedCommand;
  pid: number;
  usedFallback: boolean;
  settingUpdated: boolean;
  failures: LaunchFailure[];
}

export class EditorLauncher {
  private readonly logger: Logger;

  constructor(
    private readonly service: ResolutionService,
    private readonly launcher: EditorProcessLauncher,
    private readonly settings: EditorSettingsStore,
    logger?: Logger
  ) {
    this.logger = logger ?? Logger.createDefault('EditorLauncher');
  }

  /**
   * @throws NoDirectoryDetectedError or NoEditorAvailableError
   */
  public async openActiveFolder(editorOverride?: string): Promise<OpenFolderResult> {
    const preferred = this.preferredSettings(editorOverride);
    const authorized = await this.service.resolveAndAuthorize(preferred);
    return this.launchFirst(authorized.directory, authorized.commands, preferred);
  }

  /**
   * @throws InvalidPathError or NoEditorAvailableError
   */
  public async openFolder(candidate: string, editorOverride?: string): Promise<OpenFolderResult> {
    const directory = this.service.authorizeDirectory(candidate);
    const preferred = this.preferredSettings(editorOverride);
    const { commands, attempted } = this.service.authorizeEditors(preferred);
    if (commands.length === 0) {
      throw new NoEditorAvailableError(attempted);
    }
    return this.launchFirst(directory, commands, preferred);
  }

  /**
   * An explicit editor goes first; the configured one is always tried before any fallback
   */
  private preferredSettings(editorOverride: string | undefined): string[] {
    const configured = this.settings.getEditorCommand();
    if (editorOverride === undefined || editorOverride === configured) {
      return [configured];
    }
    return [editorOverride, configured];
  }

  private async launchFirst(
    directory: ValidatedPath,
    commands: readonly ValidatedCommand[],
    preferred: readonly string[]
  ): Promise<OpenFolderResult> {
    const failures: LaunchFailure[] = [];

    for (const command of commands) {
      const result = await this.launcher.launch(command, directory);
      if (!result.success) {
        failures.push({ command: command.source, reason: result.reason });
        continue;
      }

      // A fallback only starts after the configured setting was rejected or failed to start
      const usedFallback = !preferred.includes(command.source);
      let settingUpdated = false;
      if (usedFallback) {
        settingUpdated = this.settings.setEditorCommand(command.source);
        this.logger.info(`Editor setting updated to working fallback ${command.source}`, { persisted: settingUpdated });
      }

      return { directory, command, pid: result.pid, usedFallback, settingUpdated, failures };
    }

    this.logger.warn('No authorized editor could be started', { failures });
    throw new NoEditorAvailableError(commands.map(command => command.source));
  }
}
