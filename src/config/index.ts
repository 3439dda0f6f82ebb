/**
 * Application configuration
 * Loads .env and validates the environment once at startup
 */

import dotenv from "dotenv";
import { z } from "zod";
import { LogLevel } from "../core/interfaces/ILogger.js";

// Load environment variables
dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  MCP_SERVER_NAME: z.string().min(1).default("uri-request-mcp"),
  HTTP_DEFAULT_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  NODE_ENV: z.string().default("production"),
});

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  serverName: string;
  serverVersion: string;
  /** Fallback applied when a request sets no timeout; 0 means none */
  defaultTimeoutMs: number;
  isDevelopment: boolean;
}

export const SERVER_VERSION = "1.0.0";

/**
 * Build the config from an environment record
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    serverName: vars.MCP_SERVER_NAME,
    serverVersion: SERVER_VERSION,
    defaultTimeoutMs: vars.HTTP_DEFAULT_TIMEOUT_MS,
    isDevelopment: vars.NODE_ENV === "development",
  };
}
