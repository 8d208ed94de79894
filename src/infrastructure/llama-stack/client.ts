/**
 * LLaMA Stack REST client
 *
 * Covers the handful of endpoints the chat frontend needs: tool discovery and
 * invocation, agents, OpenAI-compatible inference and server inspection.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { Success, Failure, type Result } from '../../domain/types/index.js';
import { errorMessage } from '../../lib/errors.js';
import {
  agentCreatedSchema,
  chatCompletionSchema,
  healthSchema,
  modelListSchema,
  sessionCreatedSchema,
  toolGroupListSchema,
  toolInvocationResultSchema,
  toolListSchema,
  turnSchema,
  versionSchema,
  type ChatCompletion,
  type LlamaModel,
  type LlamaTool,
  type ToolGroup,
  type ToolInvocationResult,
  type Turn,
} from './schemas.js';

export type FetchFn = typeof fetch;

export interface LlamaStackClientOptions {
  baseUrl: string;
  logger: Logger;
  /** Request timeout in milliseconds */
  timeout?: number;
  fetch?: FetchFn;
}

export type ToolChoice = 'auto' | 'required' | 'none';

export interface AgentConfig {
  model: string;
  instructions: string;
  toolgroups: string[];
  sampling_params: Record<string, unknown>;
  tool_config?: { tool_choice: ToolChoice };
}

export interface CompletionMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: CompletionMessage[];
  temperature?: number;
  max_tokens?: number;
}

export interface ToolGroupRegistration {
  toolgroupId: string;
  providerId: string;
  mcpEndpoint?: string;
  args?: Record<string, unknown>;
}

type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Operations used by the services; tests provide in-memory implementations
 */
export interface LlamaStackApi {
  readonly baseUrl: string;
  listTools(toolgroupId?: string): Promise<Result<LlamaTool[]>>;
  listToolGroups(): Promise<Result<ToolGroup[]>>;
  registerToolGroup(registration: ToolGroupRegistration): Promise<Result<void>>;
  unregisterToolGroup(toolgroupId: string): Promise<Result<void>>;
  invokeTool(toolName: string, kwargs: Record<string, unknown>): Promise<Result<ToolInvocationResult>>;
  version(): Promise<Result<string>>;
  health(): Promise<Result<string>>;
  listModels(): Promise<Result<LlamaModel[]>>;
  chatCompletion(request: ChatCompletionRequest): Promise<Result<ChatCompletion>>;
  createAgent(config: AgentConfig): Promise<Result<string>>;
  createSession(agentId: string, sessionName: string): Promise<Result<string>>;
  createTurn(agentId: string, sessionId: string, messages: CompletionMessage[]): Promise<Result<Turn>>;
}

export class LlamaStackClient implements LlamaStackApi {
  readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly timeout: number;
  private readonly fetchFn: FetchFn;

  constructor(options: LlamaStackClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.logger = options.logger;
    this.timeout = options.timeout ?? 120_000;
    this.fetchFn = options.fetch ?? fetch;
  }

  listTools(toolgroupId?: string): Promise<Result<LlamaTool[]>> {
    const query = toolgroupId ? `?toolgroup_id=${encodeURIComponent(toolgroupId)}` : '';
    return this.request('GET', `/v1/tools${query}`, toolListSchema);
  }

  listToolGroups(): Promise<Result<ToolGroup[]>> {
    return this.request('GET', '/v1/toolgroups', toolGroupListSchema);
  }

  async registerToolGroup(registration: ToolGroupRegistration): Promise<Result<void>> {
    const result = await this.request('POST', '/v1/toolgroups', z.unknown(), {
      toolgroup_id: registration.toolgroupId,
      provider_id: registration.providerId,
      ...(registration.mcpEndpoint ? { mcp_endpoint: { uri: registration.mcpEndpoint } } : {}),
      ...(registration.args ? { args: registration.args } : {}),
    });
    return result.ok ? Success(undefined) : Failure(result.error);
  }

  async unregisterToolGroup(toolgroupId: string): Promise<Result<void>> {
    const result = await this.request(
      'DELETE',
      `/v1/toolgroups/${encodeURIComponent(toolgroupId)}`,
      z.unknown(),
    );
    return result.ok ? Success(undefined) : Failure(result.error);
  }

  invokeTool(
    toolName: string,
    kwargs: Record<string, unknown>,
  ): Promise<Result<ToolInvocationResult>> {
    return this.request('POST', '/v1/tool-runtime/invoke', toolInvocationResultSchema, {
      tool_name: toolName,
      kwargs,
    });
  }

  async version(): Promise<Result<string>> {
    const result = await this.request('GET', '/v1/version', versionSchema);
    return result.ok ? Success(result.value.version) : Failure(result.error);
  }

  async health(): Promise<Result<string>> {
    const result = await this.request('GET', '/v1/health', healthSchema);
    return result.ok ? Success(result.value.status) : Failure(result.error);
  }

  listModels(): Promise<Result<LlamaModel[]>> {
    return this.request('GET', '/v1/models', modelListSchema);
  }

  chatCompletion(request: ChatCompletionRequest): Promise<Result<ChatCompletion>> {
    return this.request('POST', '/v1/openai/v1/chat/completions', chatCompletionSchema, {
      ...request,
      stream: false,
    });
  }

  async createAgent(config: AgentConfig): Promise<Result<string>> {
    const result = await this.request('POST', '/v1/agents', agentCreatedSchema, {
      agent_config: config,
    });
    return result.ok ? Success(result.value.agent_id) : Failure(result.error);
  }

  async createSession(agentId: string, sessionName: string): Promise<Result<string>> {
    const result = await this.request(
      'POST',
      `/v1/agents/${encodeURIComponent(agentId)}/session`,
      sessionCreatedSchema,
      { session_name: sessionName },
    );
    return result.ok ? Success(result.value.session_id) : Failure(result.error);
  }

  createTurn(
    agentId: string,
    sessionId: string,
    messages: CompletionMessage[],
  ): Promise<Result<Turn>> {
    return this.request(
      'POST',
      `/v1/agents/${encodeURIComponent(agentId)}/session/${encodeURIComponent(sessionId)}/turn`,
      turnSchema,
      { messages, stream: false },
    );
  }

  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<Result<z.output<S>>> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug({ method, url }, 'LLaMA Stack request');

    try {
      const response = await this.fetchFn(url, {
        method,
        headers: {
          Accept: 'application/json',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
        signal: AbortSignal.timeout(this.timeout),
      });

      const text = await response.text();
      if (!response.ok) {
        this.logger.debug({ method, url, status: response.status }, 'LLaMA Stack request failed');
        return Failure(`${method} ${path} failed: HTTP ${response.status} ${text}`.trim());
      }

      const payload: unknown = text.trim() === '' ? undefined : JSON.parse(text);
      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue: z.ZodIssue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        return Failure(`Unexpected response from ${method} ${path}: ${issues}`);
      }

      return Success(parsed.data);
    } catch (error) {
      return Failure(`${method} ${path} failed: ${errorMessage(error)}`);
    }
  }
}
