/**
 * ProcessLauncher Class
 * Starts the editor as a detached child with its standard streams discarded.
 */

import { spawn } from 'child_process';
import type { SpawnOptions } from 'child_process';
import type {
  EditorProcessLauncher,
  LaunchFailureReason,
  LaunchResult,
  LaunchedProcess,
  ValidatedCommand,
  ValidatedPath
} from '../types/index';
import { Logger } from '../logging/Logger';
import { errorCode, errorMessage } from '../errors/LauncherErrors';

export const DEFAULT_LAUNCH_TIMEOUT_MS = 3000;

/**
 * The part of a child process the launcher relies on
 */
export interface SpawnedProcess {
  readonly pid?: number | undefined;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  unref(): void;
}

export type Spawner = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

export interface ProcessLauncherOptions {
  timeoutMs?: number;
  spawner?: Spawner;
}

export class ProcessLauncher implements EditorProcessLauncher {
  private readonly timeoutMs: number;
  private readonly spawner: Spawner;
  private readonly logger: Logger;
  private readonly launched: LaunchedProcess[] = [];

  constructor(options: ProcessLauncherOptions = {}, logger?: Logger) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LAUNCH_TIMEOUT_MS;
    this.spawner = options.spawner ?? spawn;
    this.logger = logger ?? Logger.createDefault('ProcessLauncher');
  }

  public launch(command: ValidatedCommand, directory: ValidatedPath): Promise<LaunchResult> {
    return new Promise<LaunchResult>(resolve => {
      let timer: NodeJS.Timeout | undefined;
      let settled = false;

      const finish = (result: LaunchResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      let child: SpawnedProcess;
      try {
        child = this.spawner(command.path, [directory.path], {
          cwd: directory.path,
          detached: true,
          stdio: 'ignore'
        });
      } catch (error) {
        finish(this.failure(command, error));
        return;
      }

      timer = setTimeout(() => {
        finish({ success: false, reason: 'timeout', message: `Editor did not start within ${this.timeoutMs}ms` });
      }, this.timeoutMs);

      child.once('spawn', () => {
        const pid = child.pid;
        if (pid === undefined) {
          finish({ success: false, reason: 'failed', message: 'Editor process has no pid' });
          return;
        }

        child.unref();
        this.launched.push({ pid, command: command.path, directory: directory.path, launchedAt: new Date() });
        this.logger.info(`Launched ${command.path}`, { pid, directory: directory.path });
        finish({ success: true, pid });
      });

      child.once('error', error => {
        finish(this.failure(command, error));
      });
    });
  }

  public getLaunchedProcesses(): LaunchedProcess[] {
    return [...this.launched];
  }

  public static classifyError(error: unknown): LaunchFailureReason {
    switch (errorCode(error)) {
      case 'ENOENT':
        return 'not_found';
      case 'EACCES':
      case 'EPERM':
        return 'permission_denied';
      default:
        return 'failed';
    }
  }

  private failure(command: ValidatedCommand, error: unknown): LaunchResult {
    const reason = ProcessLauncher.classifyError(error);
    const message = errorMessage(error);
    this.logger.warn(`Failed to launch ${command.path}: ${reason}`, { error });
    return { success: false, reason, message };
  }
}
