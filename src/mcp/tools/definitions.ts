/**
 * Tool Definitions
 *
 * One `search_<modality>` tool per registry entry, generated from the
 * registry, plus `list_modalities`.
 *
 * @module mcp/tools/definitions
 */

import { DEFAULT_TOP_K } from "../../lib/config.ts";
import type { ModalityRegistry } from "../../modalities/registry.ts";
import type { ResolvedModality } from "../../modalities/types.ts";
import { LIST_MODALITIES_TOOL, SEARCH_TOOL_PREFIX } from "../server/constants.ts";
import type { MCPTool } from "../types.ts";

export function searchToolName(modality: string): string {
  return `${SEARCH_TOOL_PREFIX}${modality}`;
}

/**
 * Modality behind a search tool name, or null for any other tool
 */
export function modalityFromToolName(toolName: string): string | null {
  return toolName.startsWith(SEARCH_TOOL_PREFIX) ? toolName.slice(SEARCH_TOOL_PREFIX.length) : null;
}

export function createSearchTool(modality: ResolvedModality, maxTopK: number): MCPTool {
  return {
    name: searchToolName(modality.name),
    description: modality.task.description,
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Text to search the knowledge base for",
        },
        top_k: {
          type: "integer",
          description: `How many chunks to return (default: ${DEFAULT_TOP_K}, max: ${maxTopK})`,
          default: DEFAULT_TOP_K,
          minimum: 1,
          maximum: maxTopK,
        },
      },
      required: ["query"],
    },
  };
}

export const listModalitiesTool: MCPTool = {
  name: LIST_MODALITIES_TOOL,
  description: "List the available search tools with their embedding model, task and distance metric",
  inputSchema: {
    type: "object",
    properties: {},
  },
};

/**
 * Every tool the server exposes, search tools in registry order
 */
export function getTools(registry: ModalityRegistry, maxTopK: number): MCPTool[] {
  return [
    ...registry.list().map((modality) => createSearchTool(modality, maxTopK)),
    listModalitiesTool,
  ];
}
