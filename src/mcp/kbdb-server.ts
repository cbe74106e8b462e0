/**
 * KBDB MCP Server
 *
 * Exposes the retrieval engine over the Model Context Protocol:
 * - tools/list: one search_<modality> tool per registry entry + list_modalities
 * - tools/call: runs the search; always answers with a text item
 *
 * Requests are handled independently; the registry is read-only and the
 * database pool is the only shared resource. A cancelled MCP request
 * aborts its embedding call and database query.
 *
 * @module mcp/kbdb-server
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  type CallToolRequest,
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { DbClient } from "../db/types.ts";
import { errorMessage } from "../errors/error-types.ts";
import type { ModalityRegistry } from "../modalities/registry.ts";
import { getLogger } from "../telemetry/logger.ts";
import { formatModalityList } from "../vector/format.ts";
import type { RetrievalEngine } from "../vector/search.ts";
import { failure, handleSearch } from "./handlers/search-handler.ts";
import { LIST_MODALITIES_TOOL, ServerDefaults } from "./server/constants.ts";
import { createMCPServer, startStdioServer, stopServer } from "./server/lifecycle.ts";
import { getTools, modalityFromToolName } from "./tools/definitions.ts";
import type { MCPTool, MCPToolResponse, ResolvedServerConfig, ServerConfig } from "./types.ts";

const logger = getLogger("mcp");

export class KBDBServer {
  private readonly server: Server;
  private readonly config: ResolvedServerConfig;
  private readonly tools: MCPTool[];
  private readonly toolNames: Set<string>;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly engine: RetrievalEngine,
    private readonly registry: ModalityRegistry,
    private readonly db: DbClient | null = null,
    config: ServerConfig = {},
  ) {
    this.config = {
      name: config.name ?? ServerDefaults.name,
      version: config.version ?? ServerDefaults.version,
    };
    this.tools = getTools(registry, engine.topKCeiling);
    this.toolNames = new Set(this.tools.map((t) => t.name));
    this.server = createMCPServer(this.config);
    this.server.onclose = () => this.onTransportClosed();
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, () => ({ tools: this.tools }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest, extra) => {
      const response = await this.callTool(request.params.name, request.params.arguments, extra.signal);
      return {
        content: [{ type: "text" as const, text: response.text }],
        isError: response.isError,
      };
    });
  }

  listTools(): MCPTool[] {
    return this.tools;
  }

  /**
   * Dispatch one tool call. Never throws.
   */
  async callTool(name: string, args: unknown, signal?: AbortSignal): Promise<MCPToolResponse> {
    if (!this.toolNames.has(name)) {
      return failure(name, new Error(`Unknown tool: ${name}`));
    }
    if (name === LIST_MODALITIES_TOOL) {
      return { text: formatModalityList(this.registry.list()), isError: false };
    }

    const modality = modalityFromToolName(name);
    if (modality === null) {
      return failure(name, new Error(`Unknown tool: ${name}`));
    }
    return await handleSearch(this.engine, name, modality, args, signal);
  }

  /** Attach to an arbitrary transport (in-memory in tests) */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async start(): Promise<void> {
    await startStdioServer(this.server, this.config, this.tools.length);
    logger.debug(`Tools: ${[...this.toolNames].join(", ")}`);
  }

  /** Idempotent; also runs when the client closes the transport */
  stop(): Promise<void> {
    // Deferred: stdio closes synchronously, re-entering onTransportClosed
    this.stopping ??= Promise.resolve().then(() => stopServer(this.server, this.db));
    return this.stopping;
  }

  private onTransportClosed(): void {
    if (this.stopping) return;
    logger.info("MCP client disconnected");
    this.stop().catch((error: unknown) => {
      logger.error(`Shutdown after disconnect failed: ${errorMessage(error)}`);
    });
  }
}
