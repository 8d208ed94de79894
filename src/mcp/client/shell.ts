/**
 * Interactive MCP client menu
 */

import type { McpToolClient } from './mcp-client.js';
import { formatToolResult } from './mcp-client.js';

export interface ShellIO {
  /** Resolves undefined once input is closed */
  ask(question: string): Promise<string | undefined>;
  print(text: string): void;
}

export const MENU = [
  '',
  'MCP Client Menu:',
  '1. List all tools (full details)',
  '2. List tool names only',
  '3. Get info about a specific tool',
  '4. Execute a tool',
  '5. Exit',
].join('\n');

export async function runMcpShell(client: McpToolClient, io: ShellIO): Promise<void> {
  for (;;) {
    io.print(MENU);
    const choice = await io.ask('Enter your choice (1-5): ');
    if (choice === undefined) {
      return;
    }

    switch (choice.trim()) {
      case '1': {
        const tools = await client.listTools();
        io.print(tools.ok ? JSON.stringify(tools.value, null, 2) : `❌ ${tools.error}`);
        break;
      }
      case '2': {
        const names = await client.listToolNames();
        io.print(names.ok ? names.value : `❌ ${names.error}`);
        break;
      }
      case '3': {
        const name = await io.ask('Enter tool name: ');
        if (name === undefined) {
          return;
        }
        const info = await client.getToolInfo(name.trim());
        io.print(info.ok ? info.value : `❌ ${info.error}`);
        break;
      }
      case '4': {
        const name = await io.ask('Enter tool name: ');
        if (name === undefined) {
          return;
        }
        const params = await io.ask('Enter parameters as JSON (or press Enter for none): ');
        if (params === undefined) {
          return;
        }
        const result = await client.callToolWithJson(name.trim(), params);
        io.print(result.ok ? formatToolResult(result.value) : `❌ ${result.error}`);
        break;
      }
      case '5':
        io.print('Goodbye!');
        return;
      default:
        io.print('Invalid choice. Please enter 1-5.');
    }
  }
}
