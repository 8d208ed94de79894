/**
 * Chat Service
 *
 * Drives a LLaMA Stack agent that answers cluster questions through the MCP
 * tool groups registered on the server. The agent and its session are
 * created on the first message and reused afterwards.
 */

import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../domain/types/index.js';
import type { ChatHistory, ChatReply } from '../domain/types/index.js';
import type { SamplingParams } from '../config/index.js';
import { DEFAULTS } from '../config/defaults.js';
import type { LlamaStackApi, Turn } from '../infrastructure/llama-stack/index.js';
import { createTimer } from '../lib/logger.js';
import { formatAssistantPrompt, formatTurnMessage } from '../prompts/cluster-assistant.js';
import { contentToText, filterToolGroups, uniqueToolGroups } from './tool-groups.js';

export interface ChatServiceOptions {
  client: LlamaStackApi;
  logger: Logger;
  model: string;
  samplingParams: SamplingParams;
  enableBuiltinTools: boolean;
  sessionName?: string;
}

export interface AgentSession {
  agentId: string;
  sessionId: string;
  /** Tool groups advertised to the model in every turn */
  toolGroups: string[];
}

/**
 * Assistant text of a turn, or the whole turn as JSON when it has no output
 */
export function extractTurnContent(turn: Turn): string {
  if (turn.output_message) {
    return contentToText(turn.output_message.content);
  }
  return JSON.stringify(turn);
}

export class ChatService {
  private readonly client: LlamaStackApi;
  private readonly logger: Logger;
  private readonly options: ChatServiceOptions;
  private pending: Promise<Result<AgentSession>> | undefined;

  constructor(options: ChatServiceOptions) {
    this.client = options.client;
    this.logger = options.logger.child({ component: 'chat' });
    this.options = options;
  }

  /**
   * Tool groups the agent may use, after the builtin filter
   */
  async discoverToolGroups(): Promise<Result<string[]>> {
    const tools = await this.client.listTools();
    if (!tools.ok) {
      return Failure(`Failed to list tools: ${tools.error}`);
    }

    const available = uniqueToolGroups(tools.value);
    this.logger.info({ toolgroups: available }, 'Available toolgroups');
    return Success(filterToolGroups(available, this.options.enableBuiltinTools, this.logger));
  }

  /**
   * Create the agent and its session once. A failed attempt is not cached.
   */
  initialize(): Promise<Result<AgentSession>> {
    if (!this.pending) {
      this.pending = this.createAgentSession().then((result) => {
        if (!result.ok) {
          this.pending = undefined;
        }
        return result;
      });
    }
    return this.pending;
  }

  async chat(message: string, history: ChatHistory = []): Promise<Result<ChatReply>> {
    if (message.trim() === '') {
      return Failure('Message must not be empty');
    }

    const session = await this.initialize();
    if (!session.ok) {
      return Failure(`Agent initialization failed: ${session.error}`);
    }

    const { agentId, sessionId, toolGroups } = session.value;
    const updated: ChatHistory = [...history, { role: 'user', content: message }];

    const timer = createTimer(this.logger, 'agent-turn', { agentId, sessionId });
    const turn = await this.client.createTurn(agentId, sessionId, [
      { role: 'user', content: formatTurnMessage(message, toolGroups) },
    ]);
    if (!turn.ok) {
      timer.error(turn.error);
      return Failure(`Agent turn failed: ${turn.error}`);
    }

    const steps = turn.value.steps ?? [];
    if (steps.length === 0) {
      this.logger.warn({ turnId: turn.value.turn_id }, 'Turn completed without any steps');
    } else {
      this.logger.debug(
        { steps: steps.map((step) => step.step_type ?? 'unknown') },
        'Turn steps',
      );
    }

    const content = extractTurnContent(turn.value);
    timer.end({ responseLength: content.length });

    updated.push({ role: 'assistant', content });
    return Success({ history: updated, message: '' });
  }

  private async createAgentSession(): Promise<Result<AgentSession>> {
    const discovered = await this.discoverToolGroups();
    if (!discovered.ok) {
      return Failure(discovered.error);
    }

    const toolGroups = discovered.value;
    const promptTools = toolGroups.length > 0 ? toolGroups.join(', ') : 'No tools available';

    const validGroups: string[] = [];
    for (const group of toolGroups) {
      const tools = await this.client.listTools(group);
      if (tools.ok) {
        this.logger.info({ toolgroup: group, tools: tools.value.length }, 'Validated toolgroup');
        validGroups.push(group);
      } else {
        this.logger.warn({ toolgroup: group, error: tools.error }, 'Toolgroup validation failed');
      }
    }

    const baseConfig = {
      model: this.options.model,
      instructions: formatAssistantPrompt(promptTools),
      toolgroups: validGroups,
      sampling_params: { ...this.options.samplingParams },
    };

    let agent = await this.client.createAgent({ ...baseConfig, tool_config: { tool_choice: 'auto' } });
    if (!agent.ok) {
      this.logger.warn({ error: agent.error }, 'Agent creation with tool_config failed, retrying without it');
      agent = await this.client.createAgent(baseConfig);
    }
    if (!agent.ok) {
      return Failure(`Failed to create agent: ${agent.error}`);
    }

    const sessionName = this.options.sessionName ?? DEFAULTS.sessionName;
    const session = await this.client.createSession(agent.value, sessionName);
    if (!session.ok) {
      return Failure(`Failed to create session: ${session.error}`);
    }

    this.logger.info(
      { agentId: agent.value, sessionId: session.value, toolgroups: validGroups },
      'Agent initialized',
    );
    return Success({ agentId: agent.value, sessionId: session.value, toolGroups });
  }
}
