/**
 * Request Controller
 * Runs the request executor for plain HTTP callers
 */

import { Request, Response } from "express";
import {
  ConfigurationError,
  RemoteError,
  TransportError,
  isRequestError,
} from "../core/errors.js";
import { LoggerFactory } from "../infrastructure/logging/LoggerFactory.js";
import { RequestExecutor } from "../mcp/RequestExecutor.js";

// Get logger for this controller
const log = LoggerFactory.getLogger("RequestController");

function statusFor(error: unknown): number {
  if (error instanceof ConfigurationError) return 400;
  if (error instanceof TransportError) return error.timedOut ? 504 : 502;
  if (error instanceof RemoteError) return 502;
  return 500;
}

/**
 * Execute one outbound request described by the JSON body
 */
export async function executeRequest(
  req: Request,
  res: Response,
  executor: RequestExecutor
): Promise<void> {
  try {
    const data = await executor.send(req.body);
    res.json({ success: true, data });
  } catch (error) {
    if (!isRequestError(error)) {
      throw error;
    }

    log.warning(`Request rejected (${error.code}): ${error.message}`);
    res.status(statusFor(error)).json({
      success: false,
      error: {
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
      },
    });
  }
}
