/**
 * Schema definition for tag-image tool
 */

import { z } from 'zod';

export const tagImageSchema = z.object({
  source: z.string().min(1).describe('Existing image reference'),
  target: z.string().min(1).describe('New reference, usually including the registry'),
});

export type TagImageParams = z.infer<typeof tagImageSchema>;
