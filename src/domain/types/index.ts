/**
 * Domain Types - Unified exports
 */

export { type Result, Success, Failure, isOk, isFail, valueOr } from './result.js';

export type {
  ChatMessage,
  ChatRole,
  ChatHistory,
  ChatReply,
  ToolGroupMethods,
} from './chat.js';
