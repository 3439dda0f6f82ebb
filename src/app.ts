/**
 * Express application
 *
 * - MCP Streamable HTTP endpoint at /mcp exposing the `uri` tool
 * - REST access to the same executor at /api/requests
 * - Health check endpoints
 */

import express, { Express, NextFunction, Request, Response } from "express";
import { AppConfig } from "./config/index.js";
import { LoggerFactory } from "./infrastructure/logging/LoggerFactory.js";
import { RequestExecutor } from "./mcp/RequestExecutor.js";
import { UriMCPServer } from "./mcp/UriMCPServer.js";
import {
  createHealthRoutes,
  createMCPRoutes,
  createRequestRoutes,
} from "./routes/index.js";

const log = LoggerFactory.getLogger("Server");

export interface AppDependencies {
  executor?: RequestExecutor;
}

function errorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err) {
    const status = err.status;
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

export function createApp(
  config: AppConfig,
  dependencies: AppDependencies = {}
): Express {
  const executor =
    dependencies.executor ??
    new RequestExecutor(undefined, undefined, {
      defaultTimeoutMs: config.defaultTimeoutMs,
    });
  const createServer = () =>
    new UriMCPServer(config.serverName, config.serverVersion, executor);

  const app = express();

  // Skip JSON parsing for MCP paths; the transport reads the raw stream
  app.use((req, res, next) => {
    if (req.path === "/mcp" || req.path.startsWith("/mcp/")) {
      next();
    } else {
      express.json({ limit: "10mb" })(req, res, next);
    }
  });

  // CORS middleware
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.header(
      "Access-Control-Allow-Headers",
      "Origin, X-Requested-With, Content-Type, Accept, Authorization, Mcp-Session-Id, Mcp-Protocol-Version"
    );

    if (req.method === "OPTIONS") {
      res.sendStatus(200);
      return;
    }

    next();
  });

  app.use("/api/requests", createRequestRoutes(executor));
  app.use(createMCPRoutes(createServer));
  app.use("/health", createHealthRoutes(config));

  // Error handling middleware
  app.use(
    (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = errorStatus(err);
      const message = err instanceof Error ? err.message : String(err);
      if (status >= 500) {
        log.error(`Unhandled error: ${message}`, err);
      }
      res.status(status).json({
        success: false,
        message: status >= 500 ? "Internal server error" : "Bad request",
        error: config.isDevelopment || status < 500 ? message : undefined,
      });
    }
  );

  return app;
}
