import type { Logger } from 'pino';
import { McpToolClient } from '../mcp/client/mcp-client.js';
import { createHttpTransport } from '../mcp/client/http-transport.js';
import { SdkTransport } from '../mcp/client/sdk-transport.js';
import type { McpTransportKind } from '../mcp/client/transport.js';

export function connectMcpClient(url: string, kind: McpTransportKind, logger: Logger): McpToolClient {
  const transport = new SdkTransport({
    url,
    kind,
    timeout: 30_000,
    createTransport: createHttpTransport,
    logger,
  });
  return new McpToolClient(logger, transport);
}
