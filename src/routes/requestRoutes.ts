/**
 * Request Routes
 * Plain HTTP access to the request executor
 */

import express, { Router } from "express";
import * as requestController from "../controllers/requestController.js";
import { RequestExecutor } from "../mcp/RequestExecutor.js";

/**
 * Create and configure request routes
 *
 * @param executor - RequestExecutor shared by every call
 * @returns Configured Express Router
 */
export function createRequestRoutes(executor: RequestExecutor): Router {
  const router = express.Router();

  // POST /api/requests - Execute one request described by the body
  router.post("/", (req, res, next) => {
    requestController.executeRequest(req, res, executor).catch(next);
  });

  return router;
}
