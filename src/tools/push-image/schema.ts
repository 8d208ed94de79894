/**
 * Schema definition for push-image tool
 */

import { z } from 'zod';

export const pushImageSchema = z.object({
  imageRef: z.string().min(1).describe('Fully qualified image reference to push'),
});

export type PushImageParams = z.infer<typeof pushImageSchema>;
