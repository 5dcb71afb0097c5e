/**
 * MCP Tool Interface Types
 * Defines the structure for launcher tools
 */

import type { ZodSchema } from 'zod';
import type { McpContent } from './mcp';

export interface JsonSchemaObject {
  $schema: string;
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties: boolean;
}

export interface LauncherTool {
  name: string;
  description: string;
  inputSchema: ZodSchema;
  jsonSchema: JsonSchemaObject;
  handler: (args: unknown) => Promise<McpContent[]>;
}
