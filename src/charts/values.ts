/**
 * Chart values schema
 *
 * One schema serves every preset: an image behind a Deployment and Service,
 * optionally exposed through an Ingress or an OpenShift Route.
 */

import { z } from 'zod';

const quantitySchema = z.union([z.string(), z.number()]);

const resourceListSchema = z.object({
  cpu: quantitySchema.optional(),
  memory: quantitySchema.optional(),
});

const envVarSchema = z.union([
  z.object({
    name: z.string().min(1),
    value: z.union([z.string(), z.number(), z.boolean()]).transform(String),
  }),
  z.object({
    name: z.string().min(1),
    secretKeyRef: z.object({
      name: z.string().min(1),
      key: z.string().min(1),
    }),
  }),
]);

export const exposureTypes = ['none', 'ingress', 'route'] as const;

export const chartValuesSchema = z.object({
  nameOverride: z.string().min(1).optional(),
  namespace: z.string().min(1).optional(),
  replicaCount: z.number().int().min(0).default(1),
  image: z.object({
    repository: z.string().min(1),
    tag: z.union([z.string().min(1), z.number()]).transform(String).default('latest'),
    pullPolicy: z.enum(['Always', 'IfNotPresent', 'Never']).default('IfNotPresent'),
  }),
  service: z.object({
    port: z.number().int().min(1).max(65535),
    targetPort: z.number().int().min(1).max(65535).optional(),
  }),
  exposure: z
    .object({
      type: z.enum(exposureTypes).default('none'),
      host: z.string().min(1).optional(),
      tls: z.boolean().default(false),
      ingressClassName: z.string().min(1).optional(),
    })
    .default({}),
  env: z.array(envVarSchema).default([]),
  args: z.array(z.string()).default([]),
  serviceAccount: z
    .object({
      create: z.boolean().default(false),
      name: z.string().min(1).optional(),
    })
    .default({}),
  rbac: z
    .object({
      clusterRole: z.string().min(1).optional(),
    })
    .default({}),
  resources: z
    .object({
      requests: resourceListSchema.optional(),
      limits: resourceListSchema.optional(),
    })
    .default({}),
  config: z
    .object({
      fileName: z.string().min(1),
      mountPath: z.string().min(1),
      content: z.string(),
    })
    .optional(),
});

export type ChartValues = z.infer<typeof chartValuesSchema>;
export type EnvVar = z.infer<typeof envVarSchema>;
export type ExposureType = (typeof exposureTypes)[number];
