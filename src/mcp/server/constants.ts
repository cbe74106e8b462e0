/**
 * MCP Server Constants
 *
 * @module mcp/server/constants
 */

/**
 * Default server configuration values
 */
export const ServerDefaults = {
  name: "kbdb",
  version: "0.3.0",
} as const;

/** search_<modality> */
export const SEARCH_TOOL_PREFIX = "search_";

export const LIST_MODALITIES_TOOL = "list_modalities";
