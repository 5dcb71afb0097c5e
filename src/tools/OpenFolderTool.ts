/**
 * OpenFolderTool Class
 * Opens an explicit folder, such as a favourite, in the editor
 */

import { z } from 'zod';
import type { JsonSchemaObject, LauncherTool, McpContent } from '../types/index';
import { EditorLauncher } from '../launcher/EditorLauncher';
import { describeOpenResult } from './OpenActiveFolderTool';
import { createErrorResponse, formatIssues, handleError, textResponse } from './responses';

const openFolderSchema = z.object({
  path: z.string().min(1, 'Folder path is required'),
  editor: z.string().min(1).optional()
});

export class OpenFolderTool implements LauncherTool {
  public readonly name = 'open_folder';
  public readonly description = 'Open a specific folder in the configured editor';
  public readonly inputSchema = openFolderSchema;
  public readonly jsonSchema: JsonSchemaObject = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    properties: {
      path: {
        type: 'string',
        minLength: 1,
        description: 'Folder to open; ~/ and home-relative paths are accepted'
      },
      editor: {
        type: 'string',
        minLength: 1,
        description: 'Editor command to use instead of the configured one'
      }
    },
    required: ['path'],
    additionalProperties: false
  };

  constructor(private readonly editorLauncher: EditorLauncher) {}

  public async handler(args: unknown): Promise<McpContent[]> {
    const parsed = this.inputSchema.safeParse(args);
    if (!parsed.success) {
      return createErrorResponse('opening folder', formatIssues(parsed.error.issues), 'validation');
    }

    try {
      const result = await this.editorLauncher.openFolder(parsed.data.path, parsed.data.editor);
      return textResponse(describeOpenResult(result));
    } catch (error) {
      return handleError('opening folder', error);
    }
  }
}
