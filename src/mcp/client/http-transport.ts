/**
 * Network transports for the MCP client
 */

import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { TransportConfig } from './transport.js';

/**
 * Streamable HTTP keeps the `Mcp-Session-Id` header across requests; SSE
 * opens the event stream and posts to the endpoint the server announces.
 */
export function createHttpTransport(config: TransportConfig): Transport {
  const url = new URL(config.url);
  return config.kind === 'sse' ? new SSEClientTransport(url) : new StreamableHTTPClientTransport(url);
}
