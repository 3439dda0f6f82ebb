/**
 * MCP Routes
 * Handles Streamable HTTP connections for the MCP protocol
 */

import express, { Request, Response, Router } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { mcpHealthCheck } from "../controllers/mcpController.js";
import { LoggerFactory } from "../infrastructure/logging/LoggerFactory.js";
import { UriMCPServer } from "../mcp/UriMCPServer.js";

const log = LoggerFactory.getLogger("MCPRoutes");

export type MCPServerFactory = () => UriMCPServer;

/**
 * Create a fresh MCP server and transport for one HTTP request.
 * Stateless mode: nothing survives between requests.
 */
export async function createFreshTransport(
  createServer: MCPServerFactory,
  res: Response
): Promise<StreamableHTTPServerTransport> {
  const server = createServer().getServer();

  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
    enableJsonResponse: true,
  });

  res.on("close", () => {
    Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
      log.warning(
        `Error closing MCP transport: ${error instanceof Error ? error.message : String(error)}`
      );
    });
  });

  await server.connect(transport);
  return transport;
}

/**
 * Handle one MCP Streamable HTTP POST
 */
async function handleMCPRequest(
  req: Request,
  res: Response,
  createServer: MCPServerFactory
): Promise<void> {
  try {
    const transport = await createFreshTransport(createServer, res);
    await transport.handleRequest(req, res);
  } catch (error) {
    log.error("Error handling MCP request", error);
    if (!res.headersSent) {
      res.status(500).json({
        jsonrpc: "2.0",
        error: { code: -32603, message: "Internal server error" },
        id: null,
      });
    }
  }
}

/**
 * Server-initiated streams and session teardown need sessions, which
 * stateless mode does not keep
 */
function methodNotAllowed(_req: Request, res: Response): void {
  res.status(405).set("Allow", "POST").json({
    jsonrpc: "2.0",
    error: { code: -32000, message: "Method not allowed." },
    id: null,
  });
}

/**
 * Create MCP routes
 */
export function createMCPRoutes(createServer: MCPServerFactory): Router {
  const router = express.Router();
  const healthServer = createServer();

  // Health check
  router.get("/api/mcp/health", (req, res, next) => {
    mcpHealthCheck(req, res, healthServer.getVersion(), healthServer.listTools()).catch(next);
  });

  // Streamable HTTP endpoint (public)
  router.post("/mcp", async (req, res) => {
    await handleMCPRequest(req, res, createServer);
  });
  router.get("/mcp", methodNotAllowed);
  router.delete("/mcp", methodNotAllowed);

  return router;
}
