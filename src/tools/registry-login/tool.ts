/**
 * Check that the container engine holds credentials for a registry.
 *
 * Runs `<engine> login --get-login <registry>`, which prints the user name
 * and exits non-zero when there is no stored login.
 */

import { ErrorCodes } from '../../lib/errors.js';
import { createTimer } from '../../lib/logger.js';
import {
  engineFailure,
  engineSuccess,
  parseToolParams,
  runEngine,
  type EngineResult,
  type ToolContext,
} from '../types.js';
import { registryLoginSchema, type RegistryLoginParams } from './schema.js';

export interface RegistryLoginResult {
  registry: string;
  username: string;
}

/**
 * Command a user runs to log in
 */
export function loginHint(engine: string, registry: string): string {
  return `${engine} login ${registry}`;
}

export async function checkRegistryLogin(
  params: RegistryLoginParams,
  context: ToolContext,
): Promise<EngineResult<RegistryLoginResult>> {
  const parsed = parseToolParams('registry-login', registryLoginSchema, params, context);
  if (!parsed.ok) {
    return parsed;
  }
  const { registry } = parsed.value;
  const timer = createTimer(context.logger, 'registry-login', { registry });

  // the user name stays off the terminal
  const result = await runEngine(context, ['login', '--get-login', registry], 30_000, false);
  if (result.exitCode !== 0) {
    timer.error(`not logged in to ${registry}`, { code: ErrorCodes.REGISTRY_LOGIN_REQUIRED });
    return engineFailure(
      `Not logged in to ${registry}. Please login first with: ${loginHint(context.engine, registry)}`,
      result.exitCode,
    );
  }

  timer.end();
  return engineSuccess({ registry, username: result.stdout });
}
