/**
 * MCP Content Response Types
 * Content shapes returned by Model Context Protocol tools
 */

export interface McpTextContent {
  type: 'text';
  text: string;
}

export type McpContent = McpTextContent;

/**
 * MCP Server Configuration
 */
export interface McpServerConfig {
  name: string;
  version: string;
  transport: 'stdio';
}
