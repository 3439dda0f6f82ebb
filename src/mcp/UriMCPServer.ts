/**
 * MCP server exposing the `uri` tool.
 * Owns the McpServer instance and turns executor outcomes into tool results.
 */

import { McpServer, RegisteredTool } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ILogger } from "../core/interfaces/ILogger.js";
import { LoggerFactory } from "../infrastructure/logging/LoggerFactory.js";
import { MCPToolResponse } from "../types/mcp.types.js";
import { ResponseResult } from "../types/response.types.js";
import { ToolExecutionResult } from "../types/tool.types.js";
import { requestParamsShape } from "../validation/requestSchema.js";
import { RequestExecutor } from "./RequestExecutor.js";

export const URI_TOOL_NAME = "uri";

export const URI_TOOL_DESCRIPTION =
  "Make one HTTP request (GET, POST, OPTIONS, HEAD, PUT, PATCH, DELETE) and return the full response: " +
  "status_code, reason, headers, cookies, text, base64 content, parsed json (null when the body is not JSON), " +
  "redirect history, Link relations, final url and elapsed microseconds. " +
  "changed is true for POST, PUT, PATCH and DELETE. Fails on any status outside 2xx.";

/**
 * Format an execution outcome as an MCP tool result
 */
export function toToolResponse(
  result: ToolExecutionResult<ResponseResult>
): MCPToolResponse {
  if (result.success && result.data) {
    return {
      content: [{ type: "text", text: JSON.stringify(result.data, null, 2) }],
    };
  }

  return {
    content: [
      {
        type: "text",
        text: `Error: ${result.error?.message ?? "Unknown error occurred"}`,
      },
    ],
    isError: true,
  };
}

export class UriMCPServer {
  private server: McpServer;
  private executor: RequestExecutor;
  private registeredTools: Map<string, RegisteredTool>;
  private logger: ILogger;
  private version: string;

  /**
   * @param serverName - Name reported to MCP clients
   * @param version - Version reported to MCP clients
   * @param executor - Executor the tool delegates to
   */
  constructor(
    serverName: string = "uri-request-mcp",
    version: string = "1.0.0",
    executor?: RequestExecutor,
    logger?: ILogger
  ) {
    this.executor = executor || new RequestExecutor();
    this.logger = logger || LoggerFactory.getLogger("UriMCP");
    this.registeredTools = new Map();
    this.version = version;
    this.server = new McpServer({ name: serverName, version });
    this.registerUriTool();
  }

  private registerUriTool(): void {
    const registeredTool = this.server.tool(
      URI_TOOL_NAME,
      URI_TOOL_DESCRIPTION,
      requestParamsShape,
      async (args) => {
        this.logger.debug(`Tool call: ${URI_TOOL_NAME}`, {
          method: args.method,
          url: args.url,
        });
        const result = await this.executor.execute(args);
        return toToolResponse(result);
      }
    );

    this.registeredTools.set(URI_TOOL_NAME, registeredTool);
    this.logger.debug(`Registered tool '${URI_TOOL_NAME}'`);
  }

  /**
   * Get the underlying MCP server instance
   */
  getServer(): McpServer {
    return this.server;
  }

  getVersion(): string {
    return this.version;
  }

  /**
   * List all registered tools
   */
  listTools(): string[] {
    return Array.from(this.registeredTools.keys());
  }

  hasTool(toolName: string): boolean {
    return this.registeredTools.has(toolName);
  }
}
