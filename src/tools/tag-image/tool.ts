/**
 * Tag Image Tool
 *
 * Gives a locally built image its registry reference
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
import { tagImageSchema, type TagImageParams } from './schema.js';

export interface TagImageResult {
  source: string;
  target: string;
}

export async function tagImage(
  params: TagImageParams,
  context: ToolContext,
): Promise<EngineResult<TagImageResult>> {
  const parsed = parseToolParams('tag-image', tagImageSchema, params, context);
  if (!parsed.ok) {
    return parsed;
  }
  const { source, target } = parsed.value;
  const timer = createTimer(context.logger, 'tag-image', { source, target });

  const result = await runEngine(context, ['tag', source, target], 60_000);
  if (result.exitCode !== 0) {
    timer.error(commandError(result), { code: ErrorCodes.IMAGE_TAG_FAILED });
    return engineFailure(`Failed to tag ${source} as ${target}: ${commandError(result)}`, result.exitCode);
  }

  timer.end();
  return engineSuccess({ source, target });
}
