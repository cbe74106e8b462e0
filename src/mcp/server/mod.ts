/**
 * MCP Server Module
 *
 * Exports server constants and lifecycle.
 *
 * @module mcp/server
 */

// Constants
export { LIST_MODALITIES_TOOL, SEARCH_TOOL_PREFIX, ServerDefaults } from "./constants.ts";

// Lifecycle management
export { createMCPServer, startStdioServer, stopServer } from "./lifecycle.ts";
