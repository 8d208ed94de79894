/**
 * Build an MCP server image with the container engine.
 *
 * @example
 * ```typescript
 * const result = await buildImage({
 *   image: 'argocd-mcp',
 *   version: 'main',
 *   tag: 'latest',
 *   repo: 'https://github.com/akuity/argocd-mcp.git',
 *   contextDir: 'images/argocd-mcp',
 *   buildArgs: { NODE_VERSION: '22.18.0' },
 * }, context);
 * ```
 */

import { ErrorCodes } from '../../lib/errors.js';
import { createTimer } from '../../lib/logger.js';
import {
  commandError,
  engineFailure,
  engineSuccess,
  parseToolParams,
  runEngine,
  type EngineResult,
  type ToolContext,
} from '../types.js';
import { buildImageSchema, type BuildImageParams } from './schema.js';

export interface BuildImageResult {
  /** `<image>:<tag>` as built locally */
  localRef: string;
  buildArgs: Record<string, string>;
  buildTime: number;
}

/**
 * UTC timestamp without milliseconds, e.g. 2024-05-01T12:00:00Z
 */
export function formatBuildDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Short commit of the working tree, `unknown` outside a git checkout
 */
export async function resolveBuildRef(context: ToolContext): Promise<string> {
  try {
    const result = await context.runner.execute('git', ['rev-parse', '--short', 'HEAD'], {
      ...(context.cwd ? { cwd: context.cwd } : {}),
      timeout: 10_000,
    });
    return result.exitCode === 0 && result.stdout !== '' ? result.stdout : 'unknown';
  } catch (error) {
    context.logger.debug({ error }, 'git rev-parse failed');
    return 'unknown';
  }
}

export function buildArgList(buildArgs: Record<string, string>): string[] {
  return Object.entries(buildArgs).flatMap(([key, value]) => ['--build-arg', `${key}=${value}`]);
}

export async function buildImage(
  params: BuildImageParams,
  context: ToolContext,
): Promise<EngineResult<BuildImageResult>> {
  const parsed = parseToolParams('build-image', buildImageSchema, params, context);
  if (!parsed.ok) {
    return parsed;
  }
  const build = parsed.value;
  const localRef = `${build.image}:${build.tag}`;
  const buildArgs: Record<string, string> = {
    MCP_SERVER_VERSION: build.version,
    MCP_SERVER_REPO: build.repo,
    ...build.buildArgs,
    BUILD_DATE: build.buildDate ?? formatBuildDate(new Date()),
    BUILD_REF: build.buildRef ?? (await resolveBuildRef(context)),
  };

  const timer = createTimer(context.logger, 'build-image', { image: localRef });
  context.logger.info({ image: localRef, contextDir: build.contextDir, buildArgs }, 'Building image');

  const startTime = Date.now();
  const result = await runEngine(context, [
    'build',
    ...buildArgList(buildArgs),
    '-t',
    localRef,
    build.contextDir,
  ]);

  if (result.exitCode !== 0) {
    timer.error(commandError(result), { code: ErrorCodes.IMAGE_BUILD_FAILED });
    return engineFailure(`Failed to build image ${localRef}: ${commandError(result)}`, result.exitCode);
  }

  const buildTime = Date.now() - startTime;
  timer.end({ buildTime });
  return engineSuccess({ localRef, buildArgs, buildTime });
}
