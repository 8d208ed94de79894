/**
 * Push Image Tool
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
import { pushImageSchema, type PushImageParams } from './schema.js';

export interface PushImageResult {
  imageRef: string;
  pushTime: number;
}

export async function pushImage(
  params: PushImageParams,
  context: ToolContext,
): Promise<EngineResult<PushImageResult>> {
  const parsed = parseToolParams('push-image', pushImageSchema, params, context);
  if (!parsed.ok) {
    return parsed;
  }
  const { imageRef } = parsed.value;
  const timer = createTimer(context.logger, 'push-image', { imageRef });
  const startTime = Date.now();

  const result = await runEngine(context, ['push', imageRef]);
  if (result.exitCode !== 0) {
    timer.error(commandError(result), { code: ErrorCodes.IMAGE_PUSH_FAILED });
    return engineFailure(`Failed to push ${imageRef}: ${commandError(result)}`, result.exitCode);
  }

  const pushTime = Date.now() - startTime;
  timer.end({ pushTime });
  return engineSuccess({ imageRef, pushTime });
}
