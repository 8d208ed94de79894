/**
 * Schema definition for build-image tool
 */

import { z } from 'zod';

export const buildImageSchema = z.object({
  image: z.string().min(1).describe('Local image name, e.g. kubernetes-mcp-server'),
  version: z.string().min(1).default('main').describe('Git ref of the MCP server to build'),
  tag: z.string().min(1).default('latest').describe('Image tag'),
  repo: z.string().url().describe('Git repository the Dockerfile clones'),
  contextDir: z.string().min(1).describe('Build context directory'),
  buildArgs: z.record(z.string()).default({}).describe('Extra build arguments'),
  buildDate: z.string().optional().describe('Overrides the BUILD_DATE argument'),
  buildRef: z.string().optional().describe('Overrides the BUILD_REF argument'),
});

export type BuildImageParams = z.infer<typeof buildImageSchema>;
