/**
 * Structured Error Classes
 *
 * Error codes shared by the engine tools and the web layer, and the
 * error raised for upstream LLaMA Stack failures.
 */

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  // Container engine errors
  REGISTRY_LOGIN_REQUIRED: 'REGISTRY_LOGIN_REQUIRED',
  IMAGE_BUILD_FAILED: 'IMAGE_BUILD_FAILED',
  IMAGE_TAG_FAILED: 'IMAGE_TAG_FAILED',
  IMAGE_PUSH_FAILED: 'IMAGE_PUSH_FAILED',
  INVALID_PARAMETER: 'INVALID_PARAMETER',

  // LLaMA Stack errors
  LLAMA_STACK_UNAVAILABLE: 'LLAMA_STACK_UNAVAILABLE',
  AGENT_TURN_FAILED: 'AGENT_TURN_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = 'AppError';
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * LLaMA Stack answered with an error or could not be reached
 */
export class LlamaStackError extends AppError {
  constructor(message: string, code: ErrorCode = ErrorCodes.LLAMA_STACK_UNAVAILABLE) {
    super(message, code);
    this.name = 'LlamaStackError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
