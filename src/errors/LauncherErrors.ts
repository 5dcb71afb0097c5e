/**
 * Launcher Error Taxonomy
 * Only NoDirectoryDetectedError and NoEditorAvailableError reach callers of the
 * resolution service; the rest are recovered where they happen.
 */

import { types } from 'util';

export type LauncherErrorCode =
  | 'INVALID_PATH'
  | 'INVALID_COMMAND'
  | 'NO_DIRECTORY_DETECTED'
  | 'NO_EDITOR_AVAILABLE'
  | 'STRATEGY_TIMEOUT'
  | 'EXTERNAL_TOOL_UNAVAILABLE';

export abstract class LauncherError extends Error {
  public abstract readonly code: LauncherErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidPathError extends LauncherError {
  public readonly code = 'INVALID_PATH';

  constructor(public readonly candidate: string, reason: string) {
    super(`Invalid path ${candidate}: ${reason}`);
  }
}

export class InvalidCommandError extends LauncherError {
  public readonly code = 'INVALID_COMMAND';

  constructor(public readonly candidate: string, reason: string) {
    super(`Invalid editor command ${candidate}: ${reason}`);
  }
}

export class NoDirectoryDetectedError extends LauncherError {
  public readonly code = 'NO_DIRECTORY_DETECTED';

  constructor(message = 'No valid folder could be detected') {
    super(message);
  }
}

export class NoEditorAvailableError extends LauncherError {
  public readonly code = 'NO_EDITOR_AVAILABLE';

  constructor(public readonly attempted: string[], message = 'No compatible editor could be found') {
    super(message);
  }
}

export class StrategyTimeoutError extends LauncherError {
  public readonly code = 'STRATEGY_TIMEOUT';

  constructor(public readonly strategy: string, public readonly timeoutMs: number) {
    super(`Strategy ${strategy} exceeded ${timeoutMs}ms`);
  }
}

export class ExternalToolUnavailableError extends LauncherError {
  public readonly code = 'EXTERNAL_TOOL_UNAVAILABLE';

  constructor(public readonly tool: string, reason: string) {
    super(`${tool} unavailable: ${reason}`);
  }
}

/**
 * Errno-style code of an error. fs and child_process errors can come from
 * another realm, where `instanceof Error` is false.
 */
export function errorCode(error: unknown): string | undefined {
  if (types.isNativeError(error) && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return types.isNativeError(error) ? error.message : String(error);
}

export interface FailureDescription {
  title: string;
  message: string;
}

/**
 * User-facing wording for a failed open request
 */
export function describeFailure(error: unknown): FailureDescription {
  if (error instanceof NoDirectoryDetectedError) {
    return {
      title: 'No folder detected',
      message: 'No valid folder could be detected.\n' +
        'Open a file manager window, or open a saved favourite folder instead.'
    };
  }

  if (error instanceof NoEditorAvailableError) {
    return {
      title: 'Editor not found',
      message: 'No compatible editor could be found.\n' +
        'Install VSCode or configure a valid editor command.'
    };
  }

  if (error instanceof InvalidPathError) {
    return {
      title: 'Folder not allowed',
      message: error.message
    };
  }

  return {
    title: 'Detection error',
    message: `An error occurred while detecting the folder:\n${errorMessage(error)}`
  };
}
