import { Router } from 'express';
import { z } from 'zod';
import type { ChatReply, ChatHistory, Result } from '../../domain/types/index.js';
import { LlamaStackError, ErrorCodes } from '../../lib/errors.js';
import { asyncHandler } from '../middleware/error-handler.js';

export interface ChatHandler {
  chat(message: string, history: ChatHistory): Promise<Result<ChatReply>>;
}

export const chatRequestSchema = z.object({
  message: z.string().refine((value) => value.trim() !== '', 'Message must not be empty'),
  history: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
      }),
    )
    .default([]),
});

export function createChatRouter(chat: ChatHandler): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const { message, history } = chatRequestSchema.parse(req.body);
      const reply = await chat.chat(message, history);
      if (!reply.ok) {
        throw new LlamaStackError(reply.error, ErrorCodes.AGENT_TURN_FAILED);
      }
      res.json(reply.value);
    }),
  );

  return router;
}
