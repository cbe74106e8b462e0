/**
 * MCP Handlers Module
 *
 * @module mcp/handlers
 */

export { failure, handleSearch, parseSearchArgs } from "./search-handler.ts";
export type { SearchToolArgs } from "./search-handler.ts";
