/**
 * Chat frontend types shared by the services and the web layer
 */

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type ChatHistory = ChatMessage[];

/**
 * Answer of a chat round: the updated history and the cleared input box
 */
export interface ChatReply {
  history: ChatHistory;
  message: string;
}

export interface ToolGroupMethods {
  /** Status line shown above the method selector */
  status: string;
  methods: string[];
}
