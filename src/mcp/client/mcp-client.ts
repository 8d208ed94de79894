/**
 * MCP tool client
 *
 * Talks to an MCP server (the Kubernetes MCP server by default) for the
 * `cdchat mcp` commands and the probe.
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types/index.js';
import { parseToolArguments } from '../../lib/json.js';
import { createTimer } from '../../lib/logger.js';
import type { CallToolResult, MCPTransport, Tool } from './transport.js';

export const INVALID_PARAMETERS_MESSAGE = 'Invalid JSON format for parameters.';

/**
 * Operations the probe and the shell rely on
 */
export interface McpToolApi {
  listTools(): Promise<Result<Tool[]>>;
  callTool(name: string, args: Record<string, unknown>): Promise<Result<CallToolResult>>;
}

export function formatToolNames(tools: Tool[]): string {
  return [
    'Available tools:',
    ...tools.map((tool) => `  - ${tool.name}`),
    '',
    `Total: ${tools.length} tools`,
  ].join('\n');
}

/**
 * Text items as they are, anything else as indented JSON
 */
export function formatToolResult(result: CallToolResult): string {
  return result.content
    .map((item) => (item.type === 'text' ? item.text : JSON.stringify(item, null, 2)))
    .join('\n');
}

export class McpToolClient implements McpToolApi {
  private readonly logger: Logger;
  private readonly transport: MCPTransport;

  constructor(logger: Logger, transport: MCPTransport) {
    this.logger = logger.child({ component: 'mcp-client' });
    this.transport = transport;
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  async listTools(): Promise<Result<Tool[]>> {
    const connected = await this.transport.connect();
    if (!connected.ok) {
      return Failure(connected.error);
    }
    const tools = await this.transport.listTools();
    if (tools.ok) {
      this.logger.debug({ count: tools.value.length }, 'Listed MCP tools');
    }
    return tools;
  }

  async listToolNames(): Promise<Result<string>> {
    const tools = await this.listTools();
    return tools.ok ? Success(formatToolNames(tools.value)) : Failure(tools.error);
  }

  async getToolInfo(name: string): Promise<Result<string>> {
    const tools = await this.listTools();
    if (!tools.ok) {
      return Failure(tools.error);
    }
    const tool = tools.value.find((candidate) => candidate.name === name);
    return Success(tool ? JSON.stringify(tool, null, 2) : `Tool '${name}' not found.`);
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<Result<CallToolResult>> {
    const connected = await this.transport.connect();
    if (!connected.ok) {
      return Failure(connected.error);
    }

    const timer = createTimer(this.logger, 'mcp-tool-call', { tool: name });
    const result = await this.transport.callTool(name, args);
    if (result.ok) {
      timer.end({ isError: result.value.isError === true });
    } else {
      timer.error(result.error);
    }
    return result;
  }

  /**
   * Call a tool with arguments typed as a JSON string
   */
  async callToolWithJson(name: string, paramsJson: string): Promise<Result<CallToolResult>> {
    const args = parseToolArguments(paramsJson);
    if (!args.ok) {
      return Failure(INVALID_PARAMETERS_MESSAGE);
    }
    return this.callTool(name, args.value);
  }
}
