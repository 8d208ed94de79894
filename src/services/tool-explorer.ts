/**
 * Tool Explorer Service
 *
 * Backs the MCP Test tab: browse tool groups, list their methods and invoke a
 * method directly through the LLaMA Stack tool runtime.
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../domain/types/index.js';
import type { ToolGroupMethods } from '../domain/types/index.js';
import type { LlamaStackApi, ToolInvocationResult } from '../infrastructure/llama-stack/index.js';
import { parseToolArguments } from '../lib/json.js';
import { createTimer } from '../lib/logger.js';
import { contentToText, toolName, uniqueToolGroups } from './tool-groups.js';

export const SELECT_TOOLGROUP_MESSAGE = '❌ Please select a toolgroup first';
export const SELECT_METHOD_MESSAGE = '❌ Please select a method first';
export const INVALID_PARAMS_MESSAGE = '❌ Invalid JSON parameters. Please check your input.';

/**
 * Text shown for an invocation; empty when the tool returned nothing
 */
export function formatInvocationResult(result: ToolInvocationResult): string {
  const text = contentToText(result.content);
  if (text !== '') {
    return text;
  }
  if (result.metadata && Object.keys(result.metadata).length > 0) {
    return JSON.stringify(result.metadata, null, 2);
  }
  return '';
}

export class ToolExplorerService {
  private readonly client: LlamaStackApi;
  private readonly logger: Logger;

  constructor(client: LlamaStackApi, logger: Logger) {
    this.client = client;
    this.logger = logger.child({ component: 'mcp' });
  }

  async listToolGroups(): Promise<Result<string[]>> {
    const tools = await this.client.listTools();
    if (!tools.ok) {
      this.logger.error({ error: tools.error }, 'Failed to list toolgroups');
      return Failure(tools.error);
    }
    return Success(uniqueToolGroups(tools.value));
  }

  async getToolGroupMethods(toolgroup: string): Promise<ToolGroupMethods> {
    if (!toolgroup) {
      return { status: SELECT_TOOLGROUP_MESSAGE, methods: [] };
    }

    const tools = await this.client.listTools();
    if (!tools.ok) {
      this.logger.error({ toolgroup, error: tools.error }, 'Failed to list methods');
      return { status: `❌ Error getting methods for toolgroup '${toolgroup}': ${tools.error}`, methods: [] };
    }

    const methods: string[] = [];
    for (const tool of tools.value) {
      if (tool.toolgroup_id !== toolgroup) {
        continue;
      }
      if (tool.tools && tool.tools.length > 0) {
        methods.push(...tool.tools.map(toolName));
      } else {
        methods.push(toolName(tool));
      }
    }

    this.logger.debug({ toolgroup, methods }, 'Toolgroup methods');
    return { status: `✅ Found ${methods.length} methods in toolgroup '${toolgroup}'`, methods };
  }

  async executeTool(toolgroup: string, method: string, paramsJson: string): Promise<string> {
    if (!toolgroup) {
      return SELECT_TOOLGROUP_MESSAGE;
    }
    if (!method) {
      return SELECT_METHOD_MESSAGE;
    }

    const args = parseToolArguments(paramsJson);
    if (!args.ok) {
      this.logger.debug({ method, error: args.error }, 'Rejected tool parameters');
      return INVALID_PARAMS_MESSAGE;
    }

    const timer = createTimer(this.logger, 'tool-invoke', { toolgroup, method });
    const result = await this.client.invokeTool(method, args.value);
    if (!result.ok) {
      timer.error(result.error);
      return `❌ Error executing method '${method}' from toolgroup '${toolgroup}': ${result.error}`;
    }

    if (result.value.error_message) {
      timer.error(result.value.error_message);
      return `❌ Error executing method '${method}' from toolgroup '${toolgroup}': ${result.value.error_message}`;
    }

    const text = formatInvocationResult(result.value);
    timer.end();
    if (text === '') {
      return `❌ Method '${method}' from toolgroup '${toolgroup}' failed: No result returned`;
    }
    return `✅ Method '${method}' from toolgroup '${toolgroup}' executed successfully:\n\n\`\`\`\n${text}\n\`\`\``;
  }
}
