/**
 * Library entry point
 */

export { createContainer, type Deps, type DepsOverrides } from './app/index.js';
export { loadConfig, describeConfig, type AppConfig, type SamplingParams } from './config/index.js';
export { Success, Failure, isOk, isFail, type Result } from './domain/types/index.js';
export type { ChatMessage } from './domain/types/index.js';
export { LlamaStackClient, type LlamaStackApi } from './infrastructure/llama-stack/index.js';
export { ChatService } from './services/chat.js';
export { ToolExplorerService } from './services/tool-explorer.js';
export { SystemStatusService } from './services/system-status.js';
export { McpToolClient } from './mcp/client/mcp-client.js';
export { SdkTransport } from './mcp/client/sdk-transport.js';
export { probeMcpServer, formatProbeReport } from './mcp/client/probe.js';
export { renderChart, CHART_NAMES } from './charts/index.js';
export { releaseImage } from './workflows/image-release.js';
export { IMAGE_CATALOG } from './workflows/image-catalog.js';
export { createWebApp } from './web/app.js';
export { startServer } from './cli/server.js';
export { createProgram, type CliRuntime } from './cli/program.js';
