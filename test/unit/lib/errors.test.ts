import { describe, it, expect } from '@jest/globals';
import { AppError, ErrorCodes, LlamaStackError, errorMessage, isAppError } from '../../../src/lib/errors';

describe('error classes', () => {
  it('defaults LLaMA Stack errors to the unavailable code', () => {
    const error = new LlamaStackError('down');
    expect(error.code).toBe(ErrorCodes.LLAMA_STACK_UNAVAILABLE);
    expect(error.name).toBe('LlamaStackError');
    expect(error.message).toBe('down');
  });

  it('keeps an explicit code', () => {
    const error = new LlamaStackError('turn', ErrorCodes.AGENT_TURN_FAILED);
    expect(error.code).toBe('AGENT_TURN_FAILED');
    expect(error).toBeInstanceOf(AppError);
  });

  it('recognises application errors', () => {
    expect(isAppError(new LlamaStackError('down'))).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
    expect(isAppError('down')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('reads messages from errors and stringifies anything else', () => {
    expect(errorMessage(new Error('nope'))).toBe('nope');
    expect(errorMessage('raw')).toBe('raw');
    expect(errorMessage(7)).toBe('7');
  });
});
