/**
 * Health Controller
 * Handles health check endpoint
 */

import { Request, Response } from "express";
import { AppConfig } from "../config/index.js";

/**
 * Health check endpoint
 */
export async function healthCheck(
  _req: Request,
  res: Response,
  config: Pick<AppConfig, "serverName" | "serverVersion">
): Promise<void> {
  res.json({
    status: "healthy",
    server: config.serverName,
    version: config.serverVersion,
    timestamp: new Date().toISOString(),
  });
}
