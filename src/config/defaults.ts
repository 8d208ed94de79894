/**
 * Default values and well-known ports of the deployed services
 */

export const DEFAULT_PORTS = {
  /** MCP servers (JSON-RPC over HTTP) */
  mcp: 8080,
  /** Chat frontend */
  frontend: 7860,
  /** LLaMA Stack API */
  llamaStack: 8321,
  /** Milvus dashboard */
  milvusDashboard: 9091,
} as const;

export const DEFAULTS = {
  llamaStackUrl: `http://localhost:${DEFAULT_PORTS.llamaStack}`,
  model: 'llama-3-2-3b',
  temperature: 0.7,
  maxTokens: 4096,
  llamaStackTimeout: 120_000,
  host: '0.0.0.0',
  port: DEFAULT_PORTS.frontend,
  mcpUrl: `http://localhost:${DEFAULT_PORTS.mcp}/mcp`,
  mcpTransport: 'http',
  registry: 'quay.io/cd-chat',
  containerEngine: 'podman',
  logLevel: 'info',
  sessionName: 'OCP_Chat_Session',
} as const;
