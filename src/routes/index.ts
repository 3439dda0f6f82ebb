/**
 * Routes Index
 * Exports all route modules
 */

export { createHealthRoutes } from "./healthRoutes.js";
export { createMCPRoutes } from "./mcpRoutes.js";
export { createRequestRoutes } from "./requestRoutes.js";
