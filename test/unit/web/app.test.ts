import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import type { Server } from 'node:http';
import { Failure, Success } from '../../../src/domain/types';
import { ChatService } from '../../../src/services/chat';
import { SystemStatusService } from '../../../src/services/system-status';
import { ToolExplorerService } from '../../../src/services/tool-explorer';
import { createWebApp } from '../../../src/web/app';
import { REQUEST_ID_HEADER } from '../../../src/web/middleware/request-logger';
import { FakeLlamaStack, createSilentLogger } from '../../__support__/utilities/test-helpers';

describe('chat frontend HTTP API', () => {
  const llama = new FakeLlamaStack();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    llama.tools = Success([
      { identifier: 'pods_list', toolgroup_id: 'mcp::kubernetes' },
      { identifier: 'list_applications', toolgroup_id: 'mcp::argocd' },
    ]);
    const logger = createSilentLogger();
    const app = createWebApp({
      chat: new ChatService({
        client: llama,
        logger,
        model: 'llama-3-2-3b',
        samplingParams: { temperature: 0.7, max_tokens: 4096, strategy: { type: 'greedy' } },
        enableBuiltinTools: false,
      }),
      toolExplorer: new ToolExplorerService(llama, logger),
      systemStatus: new SystemStatusService({ client: llama, logger, model: 'llama-3-2-3b' }),
      logger,
    });

    await new Promise<void>((resolve) => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  const postJson = (path: string, body: unknown): Promise<Response> =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy' });
    expect(response.headers.get(REQUEST_ID_HEADER)).toMatch(/^[\w-]{12}$/);
  });

  it('echoes a caller supplied request id', async () => {
    const response = await fetch(`${baseUrl}/health`, { headers: { [REQUEST_ID_HEADER]: 'req-42' } });
    expect(response.headers.get(REQUEST_ID_HEADER)).toBe('req-42');
  });

  it('answers chat messages with the updated history', async () => {
    const response = await postJson('/api/chat', {
      message: 'List pods',
      history: [{ role: 'user', content: 'hi' }, { role: 'assistant', content: 'hello' }],
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      history: [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        { role: 'user', content: 'List pods' },
        { role: 'assistant', content: 'Done' },
      ],
      message: '',
    });
  });

  it('rejects empty chat messages', async () => {
    const response = await postJson('/api/chat', { message: '  ' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: { message: 'message: Message must not be empty', statusCode: 400 },
    });
  });

  it('maps failed turns to 502', async () => {
    llama.turnResult = Failure('POST turn failed: HTTP 500');
    try {
      const response = await postJson('/api/chat', { message: 'hello' });
      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({
        error: { message: 'Agent turn failed: POST turn failed: HTTP 500', statusCode: 502 },
      });
    } finally {
      llama.turnResult = Success({ output_message: { content: 'Done' }, steps: [{ step_type: 'tool_execution' }] });
    }
  });

  it('lists tool groups and their methods', async () => {
    const groups = await fetch(`${baseUrl}/api/mcp/toolgroups`);
    expect(await groups.json()).toEqual({ toolgroups: ['mcp::kubernetes', 'mcp::argocd'] });

    const methods = await fetch(`${baseUrl}/api/mcp/toolgroups/${encodeURIComponent('mcp::argocd')}/methods`);
    expect(await methods.json()).toEqual({
      status: "✅ Found 1 methods in toolgroup 'mcp::argocd'",
      methods: ['list_applications'],
    });
  });

  it('executes a tool method', async () => {
    llama.invocation = Success({ content: 'app-a Synced' });

    const response = await postJson('/api/mcp/execute', {
      toolgroup: 'mcp::argocd',
      method: 'list_applications',
      params: '{}',
    });

    expect(await response.json()).toEqual({
      output:
        "🧪 MCP Method Execution: list_applications\n\n✅ Method 'list_applications' from toolgroup 'mcp::argocd' executed successfully:\n\n```\napp-a Synced\n```",
    });
  });

  it('returns the status report', async () => {
    const response = await fetch(`${baseUrl}/api/status`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toEqual({ report: expect.stringContaining('🔍 SYSTEM STATUS REPORT') });
  });

  it('answers unknown API routes with JSON', async () => {
    const response = await fetch(`${baseUrl}/api/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: { message: 'Route not found: GET /nope', statusCode: 404 },
    });
  });

  it('serves the single page UI', async () => {
    const response = await fetch(`${baseUrl}/`);
    const html = await response.text();

    expect(response.status).toBe(200);
    expect(html).toContain('<title>Intelligent CD Chatbot</title>');
  });
});
