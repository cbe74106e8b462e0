/**
 * MCP Tools Module
 *
 * @module mcp/tools
 */

export {
  createSearchTool,
  getTools,
  listModalitiesTool,
  modalityFromToolName,
  searchToolName,
} from "./definitions.ts";
