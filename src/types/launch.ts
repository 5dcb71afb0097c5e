/**
 * Process Launch Types
 */

import type { ValidatedCommand, ValidatedPath } from './security';

export type LaunchFailureReason = 'not_found' | 'permission_denied' | 'timeout' | 'failed';

export type LaunchResult =
  | { success: true; pid: number }
  | { success: false; reason: LaunchFailureReason; message: string };

export interface LaunchedProcess {
  pid: number;
  command: string;
  directory: string;
  launchedAt: Date;
}

/**
 * Starts a detached editor process. Takes only pre-validated values.
 */
export interface EditorProcessLauncher {
  launch(command: ValidatedCommand, directory: ValidatedPath): Promise<LaunchResult>;
}
