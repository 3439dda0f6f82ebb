/**
 * Health Routes
 * Defines health check routes
 */

import express, { Router } from "express";
import { AppConfig } from "../config/index.js";
import { healthCheck } from "../controllers/healthController.js";

/**
 * Create and configure health routes
 *
 * @returns Configured Express Router
 */
export function createHealthRoutes(
  config: Pick<AppConfig, "serverName" | "serverVersion">
): Router {
  const router = express.Router();

  // GET /health - Health check
  router.get("/", (req, res, next) => {
    healthCheck(req, res, config).catch(next);
  });

  return router;
}
