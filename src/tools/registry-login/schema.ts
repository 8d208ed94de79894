/**
 * Schema definition for registry-login tool
 */

import { z } from 'zod';

export const registryLoginSchema = z.object({
  registry: z.string().min(1).describe('Registry host and optional namespace, e.g. quay.io/team'),
});

export type RegistryLoginParams = z.infer<typeof registryLoginSchema>;
