import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { z } from 'zod';
import {
  INVALID_PARAMETERS_MESSAGE,
  McpToolClient,
  formatToolNames,
  formatToolResult,
} from '../../../src/mcp/client/mcp-client';
import { SdkTransport } from '../../../src/mcp/client/sdk-transport';
import { createSilentLogger } from '../../__support__/utilities/test-helpers';

function createClusterServer(): McpServer {
  const server = new McpServer({ name: 'fake-kubernetes', version: '0.0.1' });
  server.tool('pods_list', 'List pods', { namespace: z.string().optional() }, async ({ namespace }) => ({
    content: [{ type: 'text', text: `pods in ${namespace ?? 'all namespaces'}` }],
  }));
  server.tool('namespaces_list', 'List namespaces', async () => ({
    content: [{ type: 'text', text: 'default\nkube-system' }],
  }));
  server.tool('fail', 'Always fails', async () => ({
    content: [{ type: 'text', text: 'forbidden' }],
    isError: true,
  }));
  return server;
}

describe('McpToolClient over the SDK transport', () => {
  let server: McpServer;
  let client: McpToolClient;

  beforeEach(async () => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    server = createClusterServer();
    await server.connect(serverTransport);

    const logger = createSilentLogger();
    const transport = new SdkTransport({
      url: 'memory://cluster',
      kind: 'http',
      timeout: 5_000,
      createTransport: () => clientTransport,
      logger,
    });
    client = new McpToolClient(logger, transport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('lists tools', async () => {
    const tools = await client.listTools();
    expect(tools.ok && tools.value.map((tool) => tool.name)).toEqual(['pods_list', 'namespaces_list', 'fail']);
  });

  it('formats tool names', async () => {
    expect(await client.listToolNames()).toEqual({
      ok: true,
      value: 'Available tools:\n  - pods_list\n  - namespaces_list\n  - fail\n\nTotal: 3 tools',
    });
  });

  it('describes one tool or says it is missing', async () => {
    const info = await client.getToolInfo('pods_list');
    expect(info.ok).toBe(true);
    if (info.ok) {
      expect(JSON.parse(info.value)).toMatchObject({ name: 'pods_list', description: 'List pods' });
    }

    expect(await client.getToolInfo('nodes_top')).toEqual({ ok: true, value: "Tool 'nodes_top' not found." });
  });

  it('calls tools with JSON arguments', async () => {
    const result = await client.callToolWithJson('pods_list', '{"namespace":"demo"}');
    expect(result.ok && formatToolResult(result.value)).toBe('pods in demo');

    const noArgs = await client.callToolWithJson('pods_list', '');
    expect(noArgs.ok && formatToolResult(noArgs.value)).toBe('pods in all namespaces');
  });

  it('returns tool errors as results', async () => {
    const result = await client.callTool('fail', {});
    expect(result.ok && result.value.isError).toBe(true);
  });

  it('rejects malformed arguments', async () => {
    expect(await client.callToolWithJson('pods_list', '{"namespace":')).toEqual({
      ok: false,
      error: INVALID_PARAMETERS_MESSAGE,
    });
  });
});

describe('SdkTransport', () => {
  it('fails operations before connecting', async () => {
    const transport = new SdkTransport({
      url: 'memory://none',
      kind: 'sse',
      createTransport: () => InMemoryTransport.createLinkedPair()[0],
    });

    expect(transport.isConnected()).toBe(false);
    expect(await transport.listTools()).toEqual({ ok: false, error: 'Transport not connected' });
    expect(await transport.callTool('pods_list', {})).toEqual({ ok: false, error: 'Transport not connected' });
  });

  it('reports factory failures as connection failures', async () => {
    const transport = new SdkTransport({
      url: 'memory://none',
      kind: 'http',
      createTransport: () => {
        throw new Error('unsupported scheme');
      },
    });

    expect(await transport.connect()).toEqual({
      ok: false,
      error: 'Transport connection failed: unsupported scheme',
    });
  });
});

describe('formatting helpers', () => {
  it('lists names with a total', () => {
    expect(formatToolNames([])).toBe('Available tools:\n\nTotal: 0 tools');
  });

  it('renders non-text content as JSON', () => {
    expect(
      formatToolResult({
        content: [
          { type: 'text', text: 'first' },
          { type: 'image', data: 'aGk=', mimeType: 'image/png' },
        ],
      }),
    ).toBe('first\n{\n  "type": "image",\n  "data": "aGk=",\n  "mimeType": "image/png"\n}');
  });
});
