/**
 * MCP Controller
 * Handles MCP service information endpoints
 */

import { Request, Response } from "express";
import { MCPHealthInfo } from "../types/mcp.types.js";

/**
 * Health check for MCP endpoint
 */
export async function mcpHealthCheck(
  _req: Request,
  res: Response,
  version: string,
  tools: string[]
): Promise<void> {
  const body: MCPHealthInfo = {
    success: true,
    message: "MCP service is running",
    version,
    tools,
  };
  res.json(body);
}
