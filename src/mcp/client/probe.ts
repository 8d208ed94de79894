/**
 * Kubernetes MCP server smoke test
 *
 * Three independent checks: the HTTP health endpoint, tool discovery and a
 * sample `pods_list` call. A failing step never skips the next one.
 */

import type { Logger } from 'pino';
import { errorMessage } from '../../lib/errors.js';
import { createTimer } from '../../lib/logger.js';
import type { McpToolApi } from './mcp-client.js';

export type ProbeStatus = 'ok' | 'warn' | 'fail';

export interface ProbeStep {
  name: string;
  status: ProbeStatus;
  summary: string;
  details: string[];
}

export interface ProbeReport {
  url: string;
  steps: ProbeStep[];
}

export interface ProbeOptions {
  url: string;
  client: McpToolApi;
  logger: Logger;
  fetch?: typeof fetch;
  timeout?: number;
}

export const SAMPLE_TOOL = 'pods_list';
export const SAMPLE_ARGS = { namespace: 'default' };
const LISTED_TOOLS = 5;

export function healthUrl(url: string): string {
  return `${new URL(url).origin}/health`;
}

async function checkHealth(options: ProbeOptions): Promise<ProbeStep> {
  const target = healthUrl(options.url);
  const fetchFn = options.fetch ?? fetch;
  try {
    const response = await fetchFn(target, { signal: AbortSignal.timeout(options.timeout ?? 10_000) });
    return {
      name: 'Health check',
      status: response.status === 200 ? 'ok' : 'warn',
      summary: `HTTP ${response.status}`,
      details: [target],
    };
  } catch (error) {
    return { name: 'Health check', status: 'fail', summary: errorMessage(error), details: [target] };
  }
}

async function checkToolList(client: McpToolApi): Promise<ProbeStep> {
  const tools = await client.listTools();
  if (!tools.ok) {
    return { name: 'List tools', status: 'fail', summary: tools.error, details: [] };
  }

  const names = tools.value.map((tool) => tool.name);
  const details = names.slice(0, LISTED_TOOLS).map((name) => `- ${name}`);
  if (names.length > LISTED_TOOLS) {
    details.push(`... and ${names.length - LISTED_TOOLS} more`);
  }
  return { name: 'List tools', status: 'ok', summary: `Found ${names.length} tools`, details };
}

async function checkSampleCall(client: McpToolApi): Promise<ProbeStep> {
  const name = `Call ${SAMPLE_TOOL}`;
  const result = await client.callTool(SAMPLE_TOOL, SAMPLE_ARGS);
  if (!result.ok) {
    return { name, status: 'fail', summary: result.error, details: [] };
  }

  const types = result.value.content.map((item) => item.type);
  const details = [`Content types: ${types.length > 0 ? types.join(', ') : 'none'}`];
  if (result.value.isError) {
    return { name, status: 'warn', summary: 'Tool reported an error', details };
  }
  return { name, status: 'ok', summary: 'Tool call succeeded', details };
}

export async function probeMcpServer(options: ProbeOptions): Promise<ProbeReport> {
  const timer = createTimer(options.logger, 'mcp-probe', { url: options.url });
  const steps = [
    await checkHealth(options),
    await checkToolList(options.client),
    await checkSampleCall(options.client),
  ];
  timer.end({ failed: steps.filter((step) => step.status === 'fail').length });
  return { url: options.url, steps };
}

const ICONS: Record<ProbeStatus, string> = { ok: '✅', warn: '⚠️', fail: '❌' };

export function formatProbeReport(report: ProbeReport): string {
  const lines = [`Probing MCP server at ${report.url}`, ''];
  for (const step of report.steps) {
    lines.push(`${ICONS[step.status]} ${step.name}: ${step.summary}`);
    lines.push(...step.details.map((detail) => `   ${detail}`));
  }
  return lines.join('\n');
}

export function probeSucceeded(report: ProbeReport): boolean {
  return report.steps.every((step) => step.status !== 'fail');
}
