/**
 * MCP Transport Interface
 *
 * Contract between the tool client and the connection to an MCP server, so
 * the client logic does not depend on streamable HTTP, SSE or in-memory
 * plumbing.
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Result } from '../../domain/types/index.js';

export type { CallToolResult, Tool };

export type McpTransportKind = 'http' | 'sse';

/**
 * Transport configuration options
 */
export interface TransportConfig {
  /** Server endpoint, e.g. http://localhost:8080/mcp */
  url: string;
  kind: McpTransportKind;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

export interface MCPTransport {
  connect(): Promise<Result<void>>;
  close(): Promise<void>;
  isConnected(): boolean;
  listTools(): Promise<Result<Tool[]>>;
  callTool(name: string, args: Record<string, unknown>): Promise<Result<CallToolResult>>;
}

/**
 * Builds the SDK transport the client connects through
 */
export type TransportFactory = (config: TransportConfig) => Transport;
