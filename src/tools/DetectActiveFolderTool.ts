/**
 * DetectActiveFolderTool Class
 * Reports the folder the user is looking at, without launching anything
 */

import { z } from 'zod';
import type { JsonSchemaObject, LauncherTool, McpContent } from '../types/index';
import { ResolutionService } from '../resolution/ResolutionService';
import { NoDirectoryDetectedError, describeFailure } from '../errors/LauncherErrors';
import { createErrorResponse, formatAttempt, formatIssues, handleError, textResponse } from './responses';

const detectActiveFolderSchema = z.object({}).strict();

export class DetectActiveFolderTool implements LauncherTool {
  public readonly name = 'detect_active_folder';
  public readonly description = 'Detect the folder open in the focused file manager window, with per-strategy diagnostics';
  public readonly inputSchema = detectActiveFolderSchema;
  public readonly jsonSchema: JsonSchemaObject = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    properties: {},
    additionalProperties: false
  };

  constructor(private readonly service: ResolutionService) {}

  public async handler(args: unknown): Promise<McpContent[]> {
    const parsed = this.inputSchema.safeParse(args ?? {});
    if (!parsed.success) {
      return createErrorResponse('detecting active folder', formatIssues(parsed.error.issues), 'validation');
    }

    try {
      const { directory, attempts } = await this.service.detect();
      const attemptLines = attempts.map(formatAttempt).join('\n');

      if (!directory) {
        const { title, message } = describeFailure(new NoDirectoryDetectedError());
        return textResponse(`${title}\n${message}\n\nAttempts:\n${attemptLines}`);
      }

      return textResponse(`Active folder: ${directory.path}\n\nAttempts:\n${attemptLines}`);
    } catch (error) {
      return handleError('detecting active folder', error);
    }
  }
}
