/**
 * MCP tool result shapes returned to the host
 */

export interface MCPTextContent {
  type: "text";
  text: string;
}

export interface MCPToolResponse {
  [key: string]: unknown;
  content: MCPTextContent[];
  isError?: boolean;
}

/**
 * MCP health information exposed over HTTP
 */
export interface MCPHealthInfo {
  success: boolean;
  message: string;
  version: string;
  tools: string[];
}
