/**
 * Response schemas for the LLaMA Stack REST API
 *
 * Only the fields the frontend reads are declared; everything else passes
 * through untouched so newer server releases keep parsing.
 */

import { z } from 'zod';

export const contentItemSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const interleavedContentSchema = z.union([
  z.string(),
  contentItemSchema,
  z.array(contentItemSchema),
]);

export type ContentItem = z.infer<typeof contentItemSchema>;
export type InterleavedContent = z.infer<typeof interleavedContentSchema>;

const toolNameSchema = z
  .object({
    name: z.string().optional(),
    identifier: z.string().optional(),
  })
  .passthrough();

export const toolSchema = z
  .object({
    identifier: z.string().optional(),
    name: z.string().optional(),
    toolgroup_id: z.string().optional(),
    provider_id: z.string().optional(),
    description: z.string().optional(),
    parameters: z
      .array(
        z
          .object({
            name: z.string(),
            parameter_type: z.string().optional(),
            description: z.string().optional(),
            required: z.boolean().optional(),
          })
          .passthrough(),
      )
      .optional(),
    tools: z.array(toolNameSchema).optional(),
  })
  .passthrough();

export type LlamaTool = z.infer<typeof toolSchema>;
export type NamedTool = z.infer<typeof toolNameSchema>;

/** Lists come either bare or inside a `{ data: [...] }` envelope */
export const toolListSchema = z.union([
  z.array(toolSchema),
  z.object({ data: z.array(toolSchema) }).transform((envelope) => envelope.data),
]);

export const toolGroupSchema = z
  .object({
    identifier: z.string(),
    provider_id: z.string().optional(),
    mcp_endpoint: z.object({ uri: z.string() }).nullable().optional(),
  })
  .passthrough();

export type ToolGroup = z.infer<typeof toolGroupSchema>;

export const toolGroupListSchema = z.union([
  z.array(toolGroupSchema),
  z.object({ data: z.array(toolGroupSchema) }).transform((envelope) => envelope.data),
]);

export const toolInvocationResultSchema = z
  .object({
    content: interleavedContentSchema.nullable().optional(),
    error_message: z.string().nullable().optional(),
    error_code: z.number().nullable().optional(),
    metadata: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

export type ToolInvocationResult = z.infer<typeof toolInvocationResultSchema>;

export const versionSchema = z.object({ version: z.string() }).passthrough();
export const healthSchema = z.object({ status: z.string() }).passthrough();

export const modelSchema = z
  .object({
    identifier: z.string(),
    model_type: z.string().optional(),
    provider_id: z.string().optional(),
  })
  .passthrough();

export type LlamaModel = z.infer<typeof modelSchema>;

export const modelListSchema = z.union([
  z.array(modelSchema),
  z.object({ data: z.array(modelSchema) }).transform((envelope) => envelope.data),
]);

export const chatCompletionSchema = z
  .object({
    id: z.string().optional(),
    model: z.string().optional(),
    choices: z.array(
      z
        .object({
          message: z
            .object({
              role: z.string(),
              content: z.string().nullable().optional(),
            })
            .passthrough(),
          finish_reason: z.string().nullable().optional(),
        })
        .passthrough(),
    ),
  })
  .passthrough();

export type ChatCompletion = z.infer<typeof chatCompletionSchema>;

export const agentCreatedSchema = z.object({ agent_id: z.string() }).passthrough();
export const sessionCreatedSchema = z.object({ session_id: z.string() }).passthrough();

export const turnSchema = z
  .object({
    turn_id: z.string().optional(),
    session_id: z.string().optional(),
    output_message: z
      .object({
        role: z.string().optional(),
        content: interleavedContentSchema,
        stop_reason: z.string().nullable().optional(),
      })
      .passthrough()
      .optional(),
    steps: z
      .array(
        z
          .object({
            step_type: z.string().optional(),
            step_id: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

export type Turn = z.infer<typeof turnSchema>;
