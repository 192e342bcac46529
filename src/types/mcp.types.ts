/**
 * MCP (Model Context Protocol) Type Definitions
 * Provides proper typing for MCP SDK interactions
 */

/**
 * MCP Tool Response interface
 * Standard response format for all MCP tool handlers
 */
export interface MCPToolResponse {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
  [key: string]: unknown;
}

/**
 * Raw tool arguments as received from CallToolRequestSchema
 */
export type ToolArguments = Record<string, unknown>;
