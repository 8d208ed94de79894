import { Router } from 'express';
import { z } from 'zod';
import type { Result, ToolGroupMethods } from '../../domain/types/index.js';
import { LlamaStackError } from '../../lib/errors.js';
import { asyncHandler } from '../middleware/error-handler.js';

export interface ToolExplorer {
  listToolGroups(): Promise<Result<string[]>>;
  getToolGroupMethods(toolgroup: string): Promise<ToolGroupMethods>;
  executeTool(toolgroup: string, method: string, paramsJson: string): Promise<string>;
}

export const executeRequestSchema = z.object({
  toolgroup: z.string().default(''),
  method: z.string().default(''),
  params: z.string().default('{}'),
});

export function formatExecutionOutput(method: string, output: string): string {
  return `🧪 MCP Method Execution: ${method}\n\n${output}`;
}

export function createMcpRouter(explorer: ToolExplorer): Router {
  const router = Router();

  router.get(
    '/toolgroups',
    asyncHandler(async (_req, res) => {
      const toolgroups = await explorer.listToolGroups();
      if (!toolgroups.ok) {
        throw new LlamaStackError(toolgroups.error);
      }
      res.json({ toolgroups: toolgroups.value });
    }),
  );

  router.get(
    '/toolgroups/:id/methods',
    asyncHandler(async (req, res) => {
      const toolgroup = req.params.id ?? '';
      res.json(await explorer.getToolGroupMethods(toolgroup));
    }),
  );

  router.post(
    '/execute',
    asyncHandler(async (req, res) => {
      const { toolgroup, method, params } = executeRequestSchema.parse(req.body);
      const output = await explorer.executeTool(toolgroup, method, params);
      res.json({ output: formatExecutionOutput(method, output) });
    }),
  );

  return router;
}
