/**
 * Tool execution type definitions
 */

import { RequestErrorCode } from "../core/errors.js";

export interface ToolExecutionResult<T> {
  success: boolean;
  data?: T;
  error?: ToolError;
  metadata: ExecutionMetadata;
}

export interface ToolError {
  message: string;
  code: RequestErrorCode | "INTERNAL_ERROR";
  statusCode?: number;
}

export interface ExecutionMetadata {
  /** Milliseconds */
  executionTime: number;
  timestamp: Date;
}
