/**
 * EnvironmentReportTool Class
 * Display server, desktop tool availability and recommendations
 */

import { z } from 'zod';
import type { JsonSchemaObject, LauncherTool, McpContent } from '../types/index';
import { EnvironmentProbe } from '../environment/EnvironmentProbe';
import { createErrorResponse, formatIssues, textResponse } from './responses';

const environmentReportSchema = z.object({
  refresh: z.boolean().optional().default(false)
});

export class EnvironmentReportTool implements LauncherTool {
  public readonly name = 'environment_report';
  public readonly description = 'Report the display server and which desktop tools folder detection can use';
  public readonly inputSchema = environmentReportSchema;
  public readonly jsonSchema: JsonSchemaObject = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    type: 'object',
    properties: {
      refresh: {
        type: 'boolean',
        default: false,
        description: 'Re-read the environment instead of using the cached snapshot'
      }
    },
    additionalProperties: false
  };

  constructor(private readonly probe: EnvironmentProbe) {}

  public async handler(args: unknown): Promise<McpContent[]> {
    const parsed = this.inputSchema.safeParse(args ?? {});
    if (!parsed.success) {
      return createErrorResponse('reading environment', formatIssues(parsed.error.issues), 'validation');
    }

    if (parsed.data.refresh) {
      this.probe.refresh();
    }
    return textResponse(this.probe.generateReport().join('\n'));
  }
}
