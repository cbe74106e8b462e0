/**
 * MCP Protocol and Server Types
 *
 * @module mcp/types
 */

/**
 * Tool schema as returned by tools/list
 */
export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * Text answer of a tool call. Failures are answers too: isError is set
 * and text starts with "Search failed: ".
 */
export interface MCPToolResponse {
  text: string;
  isError: boolean;
}

/**
 * MCP server configuration
 */
export interface ServerConfig {
  name?: string;
  version?: string;
}

export type ResolvedServerConfig = Required<ServerConfig>;
