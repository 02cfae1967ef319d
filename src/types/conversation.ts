export type ChatRole = 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface ConversationStore {
  getHistory(sessionId: string): Promise<ChatTurn[]>;
  append(sessionId: string, turns: ChatTurn[]): Promise<void>;
  clear(sessionId: string): Promise<void>;
}
