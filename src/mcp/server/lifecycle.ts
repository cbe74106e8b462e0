/**
 * Server Lifecycle Management
 *
 * Start/stop logic for the KBDB MCP server.
 *
 * @module mcp/server/lifecycle
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { DbClient } from "../../db/types.ts";
import { errorMessage } from "../../errors/error-types.ts";
import { getLogger } from "../../telemetry/logger.ts";
import type { ResolvedServerConfig } from "../types.ts";

const logger = getLogger("mcp");

/**
 * Initialize MCP Server instance
 */
export function createMCPServer(config: ResolvedServerConfig): Server {
  return new Server(
    {
      name: config.name,
      version: config.version,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );
}

/**
 * Start server with stdio transport
 */
export async function startStdioServer(
  server: Server,
  config: ResolvedServerConfig,
  toolCount: number,
): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("✓ KBDB MCP server started (stdio mode)");
  logger.info(`  Server: ${config.name} v${config.version}`);
  logger.info(`  Search tools: ${toolCount}`);
}

/**
 * Graceful shutdown: close the transport, then release the database pool
 */
export async function stopServer(server: Server, db: DbClient | null): Promise<void> {
  logger.info("Shutting down KBDB server...");

  try {
    await server.close();
  } catch (error) {
    logger.error(`Error closing MCP transport: ${errorMessage(error)}`);
  }

  if (db) {
    await db.close();
    logger.debug("Database pool closed");
  }
  logger.info("✓ Server stopped");
}
