/**
 * SDK Transport Implementation
 *
 * Wraps the MCP SDK `Client` to implement our transport interface. The SDK
 * transport itself comes from a factory so the same code runs over HTTP,
 * SSE or an in-memory pair.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types/index.js';
import { errorMessage } from '../../lib/errors.js';
import type {
  CallToolResult,
  MCPTransport,
  Tool,
  TransportConfig,
  TransportFactory,
} from './transport.js';

export interface SdkTransportConfig extends TransportConfig {
  createTransport: TransportFactory;
  clientName?: string;
  clientVersion?: string;
  logger?: Logger;
}

export class SdkTransport implements MCPTransport {
  private client: Client | undefined;
  private readonly config: SdkTransportConfig;
  private readonly logger: Logger | undefined;

  constructor(config: SdkTransportConfig) {
    this.config = config;
    this.logger = config.logger;
  }

  isConnected(): boolean {
    return this.client !== undefined;
  }

  async connect(): Promise<Result<void>> {
    if (this.client) {
      return Success(undefined);
    }

    const client = new Client({
      name: this.config.clientName ?? 'cd-chat-mcp-client',
      version: this.config.clientVersion ?? '1.0.0',
    });

    try {
      this.logger?.info({ url: this.config.url, transport: this.config.kind }, 'Connecting to MCP server');
      const transport = this.config.createTransport(this.config);
      await client.connect(transport, { timeout: this.config.timeout ?? 30_000 });
      this.client = client;
      this.logger?.info('MCP session established');
      return Success(undefined);
    } catch (error) {
      const message = errorMessage(error);
      this.logger?.error({ error: message }, 'Failed to connect to MCP server');
      return Failure(`Transport connection failed: ${message}`);
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    if (!client) {
      return;
    }
    try {
      await client.close();
    } catch (error) {
      this.logger?.warn({ error: errorMessage(error) }, 'Error closing MCP client');
    }
  }

  async listTools(): Promise<Result<Tool[]>> {
    const client = this.client;
    if (!client) {
      return Failure('Transport not connected');
    }
    try {
      const tools: Tool[] = [];
      let cursor: string | undefined;
      do {
        const page = await client.listTools(cursor ? { cursor } : undefined, {
          timeout: this.config.timeout,
        });
        tools.push(...page.tools);
        cursor = page.nextCursor;
      } while (cursor);
      return Success(tools);
    } catch (error) {
      return Failure(`tools/list failed: ${errorMessage(error)}`);
    }
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<Result<CallToolResult>> {
    const client = this.client;
    if (!client) {
      return Failure('Transport not connected');
    }
    try {
      const response = await client.callTool({ name, arguments: args }, CallToolResultSchema, {
        timeout: this.config.timeout,
      });
      const parsed = CallToolResultSchema.safeParse(response);
      if (!parsed.success) {
        return Failure(`tools/call ${name} returned an unexpected result`);
      }
      return Success(parsed.data);
    } catch (error) {
      return Failure(`tools/call ${name} failed: ${errorMessage(error)}`);
    }
  }
}
