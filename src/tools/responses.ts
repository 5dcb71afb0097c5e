/**
 * Shared response builders for the launcher tools
 */

import type { DetectionAttempt, McpContent, McpTextContent } from '../types/index';
import {
  InvalidPathError,
  NoDirectoryDetectedError,
  NoEditorAvailableError,
  describeFailure
} from '../errors/LauncherErrors';

export type ToolErrorType = 'validation' | 'security' | 'detection' | 'editor' | 'system';

const RECOMMENDATIONS: Record<ToolErrorType, string[]> = {
  validation: [
    'Check the tool arguments',
    'Paths may be absolute, relative to home, or start with ~/'
  ],
  security: [
    'Use folders inside your home directory or a shared location such as /tmp, /opt or /mnt',
    'Editor commands must name a known editor; shells and system utilities are refused'
  ],
  detection: [
    'Focus a file manager window and try again',
    'Install xdotool (X11) or make sure gdbus is available (Wayland)',
    'Open a favourite folder with open_folder instead'
  ],
  editor: [
    'Install VSCode or VSCodium',
    'Configure an editor command with AFL_EDITOR_COMMAND or the config file'
  ],
  system: [
    'Run environment_report to check the desktop tools',
    'Try again; set AFL_LOG_LEVEL=debug for details'
  ]
};

export function textResponse(text: string): McpContent[] {
  const content: McpTextContent = { type: 'text', text };
  return [content];
}

/**
 * Error response in MCP format
 */
export function createErrorResponse(action: string, message: string, errorType: ToolErrorType): McpContent[] {
  const recommendations = RECOMMENDATIONS[errorType].map(entry => `- ${entry}`).join('\n');
  return textResponse(
    `Error ${action}: ${message}\nError Type: ${errorType}\n\nRecommendations:\n${recommendations}`
  );
}

export function classifyError(error: unknown): ToolErrorType {
  if (error instanceof NoDirectoryDetectedError) {
    return 'detection';
  }
  if (error instanceof NoEditorAvailableError) {
    return 'editor';
  }
  if (error instanceof InvalidPathError) {
    return 'security';
  }
  return 'system';
}

/**
 * Renders a failed request with its user-facing title and explanation
 */
export function handleError(action: string, error: unknown): McpContent[] {
  const { title, message } = describeFailure(error);
  return createErrorResponse(action, `${title}\n${message}`, classifyError(error));
}

/**
 * Zod issues as one line each
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function formatAttempt(attempt: DetectionAttempt): string {
  const { outcome } = attempt;
  let detail: string;
  switch (outcome.status) {
    case 'found':
      detail = `found ${outcome.path}`;
      break;
    case 'not_found':
      detail = 'not found';
      break;
    case 'error':
      detail = `error ${outcome.reason}`;
      break;
  }
  return `- ${attempt.strategy}: ${detail} (${attempt.elapsedMs}ms)`;
}
