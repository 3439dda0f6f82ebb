/**
 * uri-request-mcp HTTP server entry point
 */

import { loadConfig } from "./config/index.js";
import { createApp } from "./app.js";
import { LoggerFactory } from "./infrastructure/logging/LoggerFactory.js";

const log = LoggerFactory.getLogger("Server");

/**
 * Main function to start the server
 */
async function main(): Promise<void> {
  const config = loadConfig();
  LoggerFactory.setLevel(config.logLevel);

  log.info("Initializing uri-request-mcp server...");
  const app = createApp(config);

  const server = app.listen(config.port, config.host, () => {
    log.info(`✓ ${config.serverName} started on ${config.host}:${config.port}`);
    log.info(`  MCP:     POST   http://${config.host}:${config.port}/mcp`);
    log.info(`  REST:    POST   http://${config.host}:${config.port}/api/requests`);
    log.info(`  Health:  GET    http://${config.host}:${config.port}/health`);
  });

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully...`);
    server.close((error) => {
      if (error) {
        log.error("Error during shutdown", error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// Start the server
main().catch((error: unknown) => {
  log.error("Fatal error", error);
  process.exit(1);
});

export { main };
