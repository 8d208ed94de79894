/**
 * `cdchat` command definitions
 *
 * Commands write through a runtime object so the CLI can run against fakes.
 */

import { Command, Option } from 'commander';
import pino from 'pino';
import type { Logger } from 'pino';
import { createContainer, type DepsOverrides } from '../app/container.js';
import { renderChart, CHART_NAMES } from '../charts/index.js';
import { loadConfig, describeConfig, type AppConfig } from '../config/index.js';
import { CommandExecutor, type CommandRunner, type OutputStream } from '../infrastructure/command-executor.js';
import type { LlamaStackApi } from '../infrastructure/llama-stack/index.js';
import { createLogger, normalizeLogLevel } from '../lib/logger.js';
import { formatToolResult, type McpToolClient } from '../mcp/client/mcp-client.js';
import { formatProbeReport, probeMcpServer, probeSucceeded } from '../mcp/client/probe.js';
import { runMcpShell } from '../mcp/client/shell.js';
import type { McpTransportKind } from '../mcp/client/transport.js';
import { IMAGE_CATALOG } from '../workflows/image-catalog.js';
import { isAffirmative, PUSH_QUESTION, releaseImage } from '../workflows/image-release.js';
import { createPrompter, type Prompter } from './prompt.js';

export type McpClientFactory = (url: string, kind: McpTransportKind, logger: Logger) => McpToolClient;

export interface CliRuntime {
  env: Record<string, string | undefined>;
  out: (text: string) => void;
  err: (text: string) => void;
  /** Raw engine output during image builds */
  write?: (chunk: string, stream: OutputStream) => void;
  /** Records the process exit code */
  exit: (code: number) => void;
  logger?: Logger;
  commandRunner?: CommandRunner;
  llamaStack?: LlamaStackApi;
  mcpClient?: McpClientFactory;
  /** Used by `probe` for the health endpoint */
  fetch?: typeof fetch;
  prompter?: () => Prompter;
  /** Whether stdin is a terminal; push prompts are skipped otherwise */
  interactive?: boolean;
  /** Starts the web server for `serve` */
  serve?: (config: AppConfig, logger: Logger) => Promise<void>;
}

interface McpOptions {
  url?: string;
  transport?: McpTransportKind;
}

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

async function defaultMcpClient(url: string, kind: McpTransportKind, logger: Logger): Promise<McpToolClient> {
  // HTTP transports load only for the commands that talk to an MCP server
  const { connectMcpClient } = await import('./mcp-connect.js');
  return connectMcpClient(url, kind, logger);
}

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command();
  let logger: Logger | undefined = runtime.logger;

  const getLogger = (): Logger => {
    if (!logger) {
      const level =
        normalizeLogLevel(program.opts<{ logLevel?: string }>().logLevel) ??
        normalizeLogLevel(runtime.env.LOG_LEVEL) ??
        'info';
      logger = createLogger({ name: 'cdchat', level }, pino.destination(2));
    }
    return logger;
  };

  const fail = (message: string, code = 1): void => {
    runtime.err(`❌ ${message}`);
    runtime.exit(code);
  };

  const withConfig = (action: (config: AppConfig) => Promise<void>) => async (): Promise<void> => {
    const config = loadConfig(runtime.env);
    if (!config.ok) {
      fail(config.error);
      return;
    }
    await action(config.value);
  };

  const containerFor = (config: AppConfig): ReturnType<typeof createContainer> => {
    const overrides: DepsOverrides = { logger: getLogger() };
    if (runtime.llamaStack) overrides.llamaStack = runtime.llamaStack;
    if (runtime.commandRunner) overrides.commandRunner = runtime.commandRunner;
    return createContainer(config, overrides);
  };

  const mcpClientFor = async (config: AppConfig, options: McpOptions): Promise<McpToolClient> => {
    const url = options.url ?? config.mcp.url;
    const kind = options.transport ?? config.mcp.transport;
    return runtime.mcpClient ? runtime.mcpClient(url, kind, getLogger()) : defaultMcpClient(url, kind, getLogger());
  };

  program
    .name('cdchat')
    .description('Chat frontend, MCP tooling, image builds and chart rendering for LLaMA Stack on OpenShift')
    .version('0.3.0')
    .addOption(new Option('--log-level <level>', 'logging level').choices(LOG_LEVELS))
    .showHelpAfterError();

  program
    .command('serve')
    .description('start the chat frontend')
    .option('--host <host>', 'listen address (default: $HOST or 0.0.0.0)')
    .option('--port <port>', 'listen port (default: $PORT or 7860)')
    .action(async (options: { host?: string; port?: string }) => {
      const env = {
        ...runtime.env,
        ...(options.host ? { HOST: options.host } : {}),
        ...(options.port ? { PORT: options.port } : {}),
      };
      const config = loadConfig(env);
      if (!config.ok) {
        fail(config.error);
        return;
      }
      for (const line of describeConfig(config.value, env)) {
        getLogger().info(line);
      }
      if (!runtime.serve) {
        fail('No server available in this runtime');
        return;
      }
      await runtime.serve(config.value, getLogger());
    });

  program
    .command('config')
    .description('show the effective configuration')
    .action(
      withConfig(async (config) => {
        runtime.out(describeConfig(config, runtime.env).join('\n'));
      }),
    );

  program
    .command('status')
    .description('print the system status report')
    .action(
      withConfig(async (config) => {
        const { systemStatus } = containerFor(config);
        runtime.out(await systemStatus.getSystemStatus());
      }),
    );

  program
    .command('models')
    .description('list models registered on LLaMA Stack')
    .action(
      withConfig(async (config) => {
        const { llamaStack } = containerFor(config);
        const models = await llamaStack.listModels();
        if (!models.ok) {
          fail(models.error);
          return;
        }
        for (const model of models.value) {
          runtime.out(`${model.identifier}${model.model_type ? ` (${model.model_type})` : ''}`);
        }
      }),
    );

  const toolgroup = program.command('toolgroup').description('manage LLaMA Stack tool groups');

  toolgroup
    .command('list')
    .description('list registered tool groups')
    .action(
      withConfig(async (config) => {
        const { llamaStack } = containerFor(config);
        const groups = await llamaStack.listToolGroups();
        if (!groups.ok) {
          fail(groups.error);
          return;
        }
        for (const group of groups.value) {
          const endpoint = group.mcp_endpoint ? ` -> ${group.mcp_endpoint.uri}` : '';
          runtime.out(`${group.identifier}${endpoint}`);
        }
      }),
    );

  toolgroup
    .command('register')
    .description('register an MCP server as a tool group')
    .argument('<id>', 'tool group id, e.g. mcp::kubernetes')
    .requiredOption('--mcp-endpoint <uri>', 'MCP server SSE endpoint')
    .option('--provider <id>', 'tool runtime provider', 'model-context-protocol')
    .action(async (id: string, options: { mcpEndpoint: string; provider: string }) => {
      await withConfig(async (config) => {
        const { llamaStack } = containerFor(config);
        const registered = await llamaStack.registerToolGroup({
          toolgroupId: id,
          providerId: options.provider,
          mcpEndpoint: options.mcpEndpoint,
        });
        if (!registered.ok) {
          fail(registered.error);
          return;
        }
        runtime.out(`✅ Registered tool group ${id}`);
      })();
    });

  toolgroup
    .command('unregister')
    .description('remove a tool group')
    .argument('<id>', 'tool group id')
    .action(async (id: string) => {
      await withConfig(async (config) => {
        const { llamaStack } = containerFor(config);
        const removed = await llamaStack.unregisterToolGroup(id);
        if (!removed.ok) {
          fail(removed.error);
          return;
        }
        runtime.out(`✅ Unregistered tool group ${id}`);
      })();
    });

  program
    .command('build-image')
    .description(`build an MCP server image (${IMAGE_CATALOG.map((image) => image.name).join(', ')})`)
    .argument('<image>', 'image to build')
    .argument('[version]', 'MCP server git ref', 'main')
    .argument('[tag]', 'image tag', 'latest')
    .argument('[registry]', 'registry to tag and push to (default: $IMAGE_REGISTRY)')
    .option('--force', 'push without asking')
    .option('--context-root <dir>', 'directory holding images/')
    .action(
      async (
        image: string,
        version: string,
        tag: string,
        registry: string | undefined,
        options: { force?: boolean; contextRoot?: string },
      ) => {
        await withConfig(async (config) => {
          const runner = runtime.commandRunner ?? new CommandExecutor(getLogger());
          let prompter: Prompter | undefined;

          const confirmPush = async (): Promise<boolean> => {
            if (!runtime.interactive) {
              return false;
            }
            prompter = runtime.prompter ? runtime.prompter() : createPrompter();
            return isAffirmative(await prompter.ask(PUSH_QUESTION));
          };

          try {
            const result = await releaseImage(
              {
                image,
                version,
                tag,
                registry: registry ?? config.build.registry,
                force: options.force === true,
                ...(options.contextRoot ? { contextRoot: options.contextRoot } : {}),
              },
              {
                logger: getLogger(),
                runner,
                engine: config.build.engine,
                ...(runtime.write ? { onOutput: runtime.write } : {}),
              },
              { confirmPush, report: runtime.out },
            );
            if (!result.ok) {
              fail(result.error, result.exitCode);
            }
          } finally {
            prompter?.close();
          }
        })();
      },
    );

  program
    .command('render-chart')
    .description(`render a chart to Kubernetes YAML (${CHART_NAMES.join(', ')})`)
    .argument('<chart>', 'chart name')
    .option('-f, --values <file...>', 'values files, later files win')
    .option('--set <expression...>', 'override values, e.g. exposure.type=route')
    .option('--release <name>', 'release name')
    .option('--charts-dir <dir>', 'directory holding the chart presets')
    .action(
      async (
        chart: string,
        options: { values?: string[]; set?: string[]; release?: string; chartsDir?: string },
      ) => {
        const rendered = await renderChart(chart, {
          logger: getLogger(),
          ...(options.values ? { valuesFiles: options.values } : {}),
          ...(options.set ? { set: options.set } : {}),
          ...(options.release ? { releaseName: options.release } : {}),
          ...(options.chartsDir ? { chartsDir: options.chartsDir } : {}),
        });
        if (!rendered.ok) {
          fail(rendered.error);
          return;
        }
        runtime.out(rendered.value);
      },
    );

  program
    .command('probe')
    .description('smoke test a Kubernetes MCP server')
    .argument('[url]', 'MCP endpoint (default: $KUBERNETES_MCP_URL)')
    .addOption(new Option('--transport <kind>', 'MCP transport').choices(['http', 'sse']))
    .action(async (url: string | undefined, options: { transport?: McpTransportKind }) => {
      await withConfig(async (config) => {
        const target = url ?? config.mcp.url;
        const client = await mcpClientFor(config, { url: target, ...(options.transport ? { transport: options.transport } : {}) });
        try {
          const report = await probeMcpServer({
            url: target,
            client,
            logger: getLogger(),
            ...(runtime.fetch ? { fetch: runtime.fetch } : {}),
          });
          runtime.out(formatProbeReport(report));
          if (!probeSucceeded(report)) {
            runtime.exit(1);
          }
        } finally {
          await client.close();
        }
      })();
    });

  const mcp = program
    .command('mcp')
    .description('talk to an MCP server directly')
    .option('--url <url>', 'MCP endpoint (default: $KUBERNETES_MCP_URL)')
    .addOption(new Option('--transport <kind>', 'MCP transport').choices(['http', 'sse']));

  const withMcpClient =
    (action: (client: McpToolClient) => Promise<void>) => async (): Promise<void> => {
      await withConfig(async (config) => {
        const client = await mcpClientFor(config, mcp.opts<McpOptions>());
        try {
          await action(client);
        } finally {
          await client.close();
        }
      })();
    };

  mcp
    .command('tools')
    .description('list tool names')
    .action(
      withMcpClient(async (client) => {
        const names = await client.listToolNames();
        if (!names.ok) {
          fail(names.error);
          return;
        }
        runtime.out(names.value);
      }),
    );

  mcp
    .command('info')
    .description('show one tool definition')
    .argument('<name>', 'tool name')
    .action(async (name: string) => {
      await withMcpClient(async (client) => {
        const info = await client.getToolInfo(name);
        if (!info.ok) {
          fail(info.error);
          return;
        }
        runtime.out(info.value);
      })();
    });

  mcp
    .command('call')
    .description('call a tool')
    .argument('<name>', 'tool name')
    .argument('[params]', 'arguments as a JSON object', '')
    .action(async (name: string, params: string) => {
      await withMcpClient(async (client) => {
        const result = await client.callToolWithJson(name, params);
        if (!result.ok) {
          fail(result.error);
          return;
        }
        runtime.out(formatToolResult(result.value));
        if (result.value.isError) {
          runtime.exit(1);
        }
      })();
    });

  mcp
    .command('shell')
    .description('interactive tool menu')
    .action(
      withMcpClient(async (client) => {
        const prompter = runtime.prompter ? runtime.prompter() : createPrompter();
        try {
          await runMcpShell(client, prompter);
        } finally {
          prompter.close();
        }
      }),
    );

  return program;
}
