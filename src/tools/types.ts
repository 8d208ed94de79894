/**
 * Shared types for the container engine tools
 */

import type { Logger } from 'pino';
import type { z } from 'zod';
import type { Result } from '../domain/types/index.js';
import type { CommandResult, CommandRunner, OutputStream } from '../infrastructure/command-executor.js';
import { ErrorCodes, errorMessage } from '../lib/errors.js';

export interface ToolContext {
  logger: Logger;
  runner: CommandRunner;
  /** Container engine binary, `podman` unless configured otherwise */
  engine: string;
  cwd?: string;
  /** Mirrors build output to the terminal */
  onOutput?: (chunk: string, stream: OutputStream) => void;
}

/**
 * Result of an engine step; a failure keeps the exit code of the tool that failed
 */
export type EngineResult<T> = Result<T> & { exitCode: number };

export function engineSuccess<T>(value: T): EngineResult<T> {
  return { ok: true, value, exitCode: 0 };
}

export function engineFailure<T>(error: string, exitCode = 1): EngineResult<T> {
  return { ok: false, error, exitCode };
}

/**
 * Validate tool parameters before the engine runs
 */
export function parseToolParams<S extends z.ZodTypeAny>(
  tool: string,
  schema: S,
  params: unknown,
  context: ToolContext,
): EngineResult<z.output<S>> {
  const parsed = schema.safeParse(params);
  if (parsed.success) {
    return engineSuccess(parsed.data);
  }
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
  context.logger.warn({ tool, code: ErrorCodes.INVALID_PARAMETER, issues }, 'Invalid tool parameters');
  return engineFailure(`Invalid ${tool} parameters: ${issues}`);
}

/**
 * Run the engine and turn a spawn error into a failed command result.
 * Output reaches `context.onOutput` unless `mirrorOutput` is false.
 */
export async function runEngine(
  context: ToolContext,
  args: string[],
  timeout = 0,
  mirrorOutput = true,
): Promise<CommandResult> {
  try {
    return await context.runner.execute(context.engine, args, {
      ...(context.cwd ? { cwd: context.cwd } : {}),
      ...(mirrorOutput && context.onOutput ? { onOutput: context.onOutput } : {}),
      timeout,
    });
  } catch (error) {
    return { stdout: '', stderr: errorMessage(error), exitCode: 127, timedOut: false };
  }
}

/**
 * Last stderr line, or stdout when stderr is empty
 */
export function commandError(result: CommandResult): string {
  const output = result.stderr || result.stdout;
  const lines = output.split('\n').filter((line) => line.trim() !== '');
  return lines[lines.length - 1] ?? `exit code ${result.exitCode}`;
}
