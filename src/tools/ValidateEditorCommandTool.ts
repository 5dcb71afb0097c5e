/**
 * ValidateEditorCommandTool Class
 * Dry-run of the editor command checks
 */

import { z } from 'zod';
import type { JsonSchemaObject, LauncherTool, McpContent } from '../types/index';
import { CommandValidator } from '../security/CommandValidator';
import { InvalidCommandError } from '../errors/LauncherErrors';
import { createErrorResponse, formatIssues, textResponse } from './responses';

const validateEditorCommandSchema = z.object({
  command: z.string().min(1, 'Editor command is required')
});

export class ValidateEditorCommandTool implements LauncherTool {
  public readonly name = 'validate_editor_command';
  public readonly description = 'Check whether an editor command would be allowed to run, and which executable it resolves to';
  public readonly inputSchema = validateEditorCommandSchema;
  public readonly jsonSchema: JsonSchemaObject = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    properties: {
      command: {
        type: 'string',
        minLength: 1,
        description: 'Editor command; only the first word is considered'
      }
    },
    required: ['command'],
    additionalProperties: false
  };

  constructor(private readonly commandValidator: CommandValidator) {}

  public async handler(args: unknown): Promise<McpContent[]> {
    const parsed = this.inputSchema.safeParse(args);
    if (!parsed.success) {
      return createErrorResponse('validating editor command', formatIssues(parsed.error.issues), 'validation');
    }

    const result = this.commandValidator.validateCommand(parsed.data.command);
    if (!result.isValid) {
      return createErrorResponse(
        'validating editor command',
        new InvalidCommandError(parsed.data.command, result.error).message,
        result.securityViolation ? 'security' : 'validation'
      );
    }

    return textResponse(
      `Editor command allowed: ${parsed.data.command}\nResolved executable: ${result.validated.path}`
    );
  }
}
