/**
 * Chat frontend HTTP server
 *
 * Serves the single-page UI and the JSON API behind its three tabs.
 */

import { existsSync } from 'node:fs';
import path from 'node:path';
import express from 'express';
import type { Logger } from 'pino';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';
import { createChatRouter, type ChatHandler } from './routes/chat.js';
import { createMcpRouter, type ToolExplorer } from './routes/mcp.js';
import { createHealthRouter, createStatusRouter, type StatusReporter } from './routes/status.js';

export interface WebAppDeps {
  chat: ChatHandler;
  toolExplorer: ToolExplorer;
  systemStatus: StatusReporter;
  logger: Logger;
  /** Directory holding index.html */
  publicDir?: string;
}

/**
 * `public/` next to this file, or the source copy when running from dist
 */
export function resolvePublicDir(): string {
  const beside = path.resolve(__dirname, 'public');
  const sources = path.resolve(__dirname, '..', '..', '..', 'src', 'web', 'public');
  return existsSync(beside) ? beside : sources;
}

export function createWebApp(deps: WebAppDeps): express.Express {
  const logger = deps.logger.child({ component: 'web' });
  const publicDir = deps.publicDir ?? resolvePublicDir();
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger(logger));

  app.use('/health', createHealthRouter());
  app.use('/api/chat', createChatRouter(deps.chat));
  app.use('/api/mcp', createMcpRouter(deps.toolExplorer));
  app.use('/api/status', createStatusRouter(deps.systemStatus));
  app.use('/api', notFoundHandler(logger));

  app.get('/', (_req, res) => {
    res.sendFile(path.join(publicDir, 'index.html'));
  });
  app.use(express.static(publicDir, { index: false }));

  app.use(errorHandler(logger));

  return app;
}
