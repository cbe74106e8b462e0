/**
 * MCP Module
 *
 * @module mcp
 */

export { KBDBServer } from "./kbdb-server.ts";
export { handleSearch, parseSearchArgs } from "./handlers/mod.ts";
export { getTools, listModalitiesTool, modalityFromToolName, searchToolName } from "./tools/mod.ts";
export { createMCPServer, LIST_MODALITIES_TOOL, SEARCH_TOOL_PREFIX, ServerDefaults, startStdioServer, stopServer } from "./server/mod.ts";
export type { MCPTool, MCPToolResponse, ResolvedServerConfig, ServerConfig } from "./types.ts";
