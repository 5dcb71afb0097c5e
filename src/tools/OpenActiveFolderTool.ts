/**
 * OpenActiveFolderTool Class
 * Detects the active folder and opens it in the editor
 */

import { z } from 'zod';
import type { JsonSchemaObject, LauncherTool, McpContent } from '../types/index';
import { EditorLauncher, OpenFolderResult } from '../launcher/EditorLauncher';
import { createErrorResponse, formatIssues, handleError, textResponse } from './responses';

const openActiveFolderSchema = z.object({
  editor: z.string().min(1).optional()
});

/**
 * Summary shared with open_folder
 */
export function describeOpenResult(result: OpenFolderResult): string {
  const lines = [`Opened ${result.directory.path} with ${result.command.path} (pid ${result.pid})`];

  for (const failure of result.failures) {
    lines.push(`Could not start ${failure.command}: ${failure.reason}`);
  }

  if (result.usedFallback) {
    lines.push(`Fallback editor used: ${result.command.source}`);
    lines.push(result.settingUpdated
      ? 'Editor setting updated for future launches'
      : 'Editor setting could not be saved');
  }

  return lines.join('\n');
}

export class OpenActiveFolderTool implements LauncherTool {
  public readonly name = 'open_active_folder';
  public readonly description = 'Open the folder shown in the focused file manager window in the configured editor';
  public readonly inputSchema = openActiveFolderSchema;
  public readonly jsonSchema: JsonSchemaObject = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    properties: {
      editor: {
        type: 'string',
        minLength: 1,
        description: 'Editor command to use instead of the configured one'
      }
    },
    additionalProperties: false
  };

  constructor(private readonly editorLauncher: EditorLauncher) {}

  public async handler(args: unknown): Promise<McpContent[]> {
    const parsed = this.inputSchema.safeParse(args ?? {});
    if (!parsed.success) {
      return createErrorResponse('opening active folder', formatIssues(parsed.error.issues), 'validation');
    }

    try {
      const result = await this.editorLauncher.openActiveFolder(parsed.data.editor);
      return textResponse(describeOpenResult(result));
    } catch (error) {
      return handleError('opening active folder', error);
    }
  }
}
