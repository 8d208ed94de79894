/**
 * Dependency Injection Container
 *
 * Creates the services behind the chat frontend from one validated
 * configuration. Tests replace any dependency through `overrides`.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config/index.js';
import { CommandExecutor, type CommandRunner } from '../infrastructure/command-executor.js';
import { LlamaStackClient, type LlamaStackApi } from '../infrastructure/llama-stack/index.js';
import { createLogger } from '../lib/logger.js';
import { ChatService } from '../services/chat.js';
import { SystemStatusService } from '../services/system-status.js';
import { ToolExplorerService } from '../services/tool-explorer.js';

/**
 * All application dependencies with their types
 */
export interface Deps {
  config: AppConfig;
  logger: Logger;
  commandRunner: CommandRunner;
  llamaStack: LlamaStackApi;
  chatService: ChatService;
  toolExplorer: ToolExplorerService;
  systemStatus: SystemStatusService;
}

/**
 * Partial dependency overrides for testing
 */
export type DepsOverrides = Partial<Deps>;

export function createContainer(config: AppConfig, overrides: DepsOverrides = {}): Deps {
  const logger = overrides.logger ?? createLogger({ level: config.logging.level });

  const commandRunner = overrides.commandRunner ?? new CommandExecutor(logger);

  const llamaStack =
    overrides.llamaStack ??
    new LlamaStackClient({
      baseUrl: config.llamaStack.url,
      timeout: config.llamaStack.timeout,
      logger: logger.child({ component: 'llama-stack' }),
    });

  const chatService =
    overrides.chatService ??
    new ChatService({
      client: llamaStack,
      logger,
      model: config.llamaStack.model,
      samplingParams: config.llamaStack.samplingParams,
      enableBuiltinTools: config.llamaStack.enableBuiltinTools,
    });

  const toolExplorer = overrides.toolExplorer ?? new ToolExplorerService(llamaStack, logger);

  const systemStatus =
    overrides.systemStatus ??
    new SystemStatusService({ client: llamaStack, logger, model: config.llamaStack.model });

  return { config, logger, commandRunner, llamaStack, chatService, toolExplorer, systemStatus };
}
