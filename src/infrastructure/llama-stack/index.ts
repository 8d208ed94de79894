export {
  LlamaStackClient,
  type LlamaStackApi,
  type LlamaStackClientOptions,
  type AgentConfig,
  type ChatCompletionRequest,
  type CompletionMessage,
  type FetchFn,
  type ToolChoice,
  type ToolGroupRegistration,
} from './client.js';
export type {
  ChatCompletion,
  ContentItem,
  InterleavedContent,
  LlamaModel,
  LlamaTool,
  NamedTool,
  ToolGroup,
  ToolInvocationResult,
  Turn,
} from './schemas.js';
