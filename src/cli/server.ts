/**
 * Chat frontend server entry point
 *
 * Wires the container into the express app and keeps it running until
 * SIGINT or SIGTERM.
 */

import type { Server } from 'node:http';
import process from 'node:process';
import type { Logger } from 'pino';
import { createContainer, type Deps, type DepsOverrides } from '../app/container.js';
import type { AppConfig } from '../config/index.js';
import { errorMessage } from '../lib/errors.js';
import { createWebApp } from '../web/app.js';

export interface RunningServer {
  deps: Deps;
  server: Server;
  url: string;
  close: () => Promise<void>;
}

/**
 * Start listening; resolves once the port is bound
 */
export function startServer(config: AppConfig, overrides: DepsOverrides = {}): Promise<RunningServer> {
  const deps = createContainer(config, overrides);
  const app = createWebApp({
    chat: deps.chatService,
    toolExplorer: deps.toolExplorer,
    systemStatus: deps.systemStatus,
    logger: deps.logger,
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.server.port, config.server.host);
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : config.server.port;
      const url = `http://${config.server.host}:${port}`;
      deps.logger.info({ url }, 'Chat frontend listening');

      const close = (): Promise<void> =>
        new Promise((done, fail) => {
          server.close((error) => (error ? fail(error) : done()));
        });

      resolve({ deps, server, url, close });
    });
  });
}

/**
 * Run until a termination signal arrives
 */
export async function serveUntilSignal(config: AppConfig, logger: Logger): Promise<void> {
  const running = await startServer(config, { logger });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down server...');
    try {
      await running.close();
      logger.info('Server shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
