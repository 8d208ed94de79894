import { describe, it, expect } from '@jest/globals';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpToolClient } from '../../../src/mcp/client/mcp-client';
import { SdkTransport } from '../../../src/mcp/client/sdk-transport';
import { MENU, runMcpShell, type ShellIO } from '../../../src/mcp/client/shell';
import { createSilentLogger } from '../../__support__/utilities/test-helpers';

class ScriptedIO implements ShellIO {
  readonly questions: string[] = [];
  readonly printed: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string | undefined> {
    this.questions.push(question);
    return this.answers.shift();
  }

  print(text: string): void {
    this.printed.push(text);
  }
}

async function connectedClient(): Promise<{ client: McpToolClient; server: McpServer }> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const server = new McpServer({ name: 'fake', version: '0.0.1' });
  server.tool('namespaces_list', 'List namespaces', async () => ({
    content: [{ type: 'text', text: 'default' }],
  }));
  await server.connect(serverTransport);
  const logger = createSilentLogger();
  const transport = new SdkTransport({
    url: 'memory://shell',
    kind: 'http',
    createTransport: () => clientTransport,
  });
  return { client: new McpToolClient(logger, transport), server };
}

describe('runMcpShell', () => {
  it('runs menu choices until exit', async () => {
    const { client, server } = await connectedClient();
    const io = new ScriptedIO(['2', '4', 'namespaces_list', '', '9', '5']);

    await runMcpShell(client, io);
    await client.close();
    await server.close();

    expect(io.questions).toEqual([
      'Enter your choice (1-5): ',
      'Enter your choice (1-5): ',
      'Enter tool name: ',
      'Enter parameters as JSON (or press Enter for none): ',
      'Enter your choice (1-5): ',
      'Enter your choice (1-5): ',
    ]);
    expect(io.printed).toEqual([
      MENU,
      'Available tools:\n  - namespaces_list\n\nTotal: 1 tools',
      MENU,
      'default',
      MENU,
      'Invalid choice. Please enter 1-5.',
      MENU,
      'Goodbye!',
    ]);
  });

  it('reports bad parameters and stops when input ends', async () => {
    const { client, server } = await connectedClient();
    const io = new ScriptedIO(['4', 'namespaces_list', 'not json', '3', 'missing']);

    await runMcpShell(client, io);
    await client.close();
    await server.close();

    expect(io.printed).toEqual([
      MENU,
      '❌ Invalid JSON format for parameters.',
      MENU,
      "Tool 'missing' not found.",
      MENU,
    ]);
  });
});
