/**
 * Type Definitions Index
 * Exports all type definitions for the active folder launcher
 */

// MCP Protocol Types
export * from './mcp';

// Security Types
export * from './security';

// Desktop Environment Types
export * from './environment';

// Detection Types
export * from './detection';

// Launch Types
export * from './launch';

// Tool Types
export * from './tools';
