/**
 * Application configuration
 *
 * Read once from the environment and validated with zod. Every value has a
 * default so a bare `cdchat serve` talks to a LLaMA Stack on localhost.
 */

import { z } from 'zod';
import { Success, Failure, type Result } from '../domain/types/index.js';
import { normalizeLogLevel } from '../lib/logger.js';
import { DEFAULTS } from './defaults.js';

export { DEFAULTS, DEFAULT_PORTS } from './defaults.js';

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => (value ?? 'false').toLowerCase() === 'true');

const envSchema = z.object({
  LLAMA_STACK_URL: z.string().url().default(DEFAULTS.llamaStackUrl),
  DEFAULT_LLM_MODEL: z.string().min(1).default(DEFAULTS.model),
  ENABLE_BUILTIN_TOOLS: booleanFlag,
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULTS.temperature),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULTS.maxTokens),
  LLAMA_STACK_TIMEOUT: z.coerce.number().int().positive().default(DEFAULTS.llamaStackTimeout),
  HOST: z.string().min(1).default(DEFAULTS.host),
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULTS.port),
  KUBERNETES_MCP_URL: z.string().url().default(DEFAULTS.mcpUrl),
  MCP_TRANSPORT: z.enum(['http', 'sse']).default(DEFAULTS.mcpTransport),
  IMAGE_REGISTRY: z.string().min(1).default(DEFAULTS.registry),
  CONTAINER_ENGINE: z.string().min(1).default(DEFAULTS.containerEngine),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? normalizeLogLevel(value) : value),
    z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default(DEFAULTS.logLevel),
  ),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

/**
 * Sampling parameters sent with every agent configuration
 */
export interface SamplingParams {
  temperature: number;
  max_tokens: number;
  strategy: { type: 'greedy' };
}

export interface AppConfig {
  llamaStack: {
    url: string;
    model: string;
    timeout: number;
    enableBuiltinTools: boolean;
    samplingParams: SamplingParams;
  };
  server: {
    host: string;
    port: number;
  };
  mcp: {
    url: string;
    transport: 'http' | 'sse';
  };
  build: {
    registry: string;
    engine: string;
  };
  logging: {
    level: string;
  };
  nodeEnv: 'development' | 'production' | 'test';
}

type Env = Record<string, string | undefined>;

/**
 * Empty strings count as unset, like an unexported variable
 */
function withoutEmpty(env: Env): Env {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
}

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Result<AppConfig> {
  const parsed = envSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return Failure(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  return Success({
    llamaStack: {
      url: vars.LLAMA_STACK_URL.replace(/\/+$/, ''),
      model: vars.DEFAULT_LLM_MODEL,
      timeout: vars.LLAMA_STACK_TIMEOUT,
      enableBuiltinTools: vars.ENABLE_BUILTIN_TOOLS,
      samplingParams: {
        temperature: vars.LLM_TEMPERATURE,
        max_tokens: vars.LLM_MAX_TOKENS,
        strategy: { type: 'greedy' },
      },
    },
    server: { host: vars.HOST, port: vars.PORT },
    mcp: { url: vars.KUBERNETES_MCP_URL, transport: vars.MCP_TRANSPORT },
    build: { registry: vars.IMAGE_REGISTRY, engine: vars.CONTAINER_ENGINE },
    logging: { level: vars.LOG_LEVEL },
    nodeEnv: vars.NODE_ENV,
  });
}

/**
 * Lines describing which variables were set and which defaults won,
 * logged once at startup
 */
export function describeConfig(config: AppConfig, env: Env = process.env): string[] {
  const source = (name: string): string => env[name] || 'Not set (using default)';
  return [
    'Environment Variables:',
    `  LLAMA_STACK_URL: ${source('LLAMA_STACK_URL')}`,
    `  DEFAULT_LLM_MODEL: ${source('DEFAULT_LLM_MODEL')}`,
    `  ENABLE_BUILTIN_TOOLS: ${source('ENABLE_BUILTIN_TOOLS')}`,
    'Final Configuration:',
    `  Llama Stack URL: ${config.llamaStack.url}`,
    `  Model: ${config.llamaStack.model}`,
    `  Builtin tools enabled: ${config.llamaStack.enableBuiltinTools}`,
  ];
}
