import { ChatTurn, ConversationStore } from '../types/conversation';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const KEY_PREFIX = 'chat:';

/** Keeps at most `maxTurns` turns, dropping whole exchanges so history always opens on a user turn. */
export function evict(turns: ChatTurn[], maxTurns: number): ChatTurn[] {
  if (turns.length <= maxTurns) return turns;

  let start = turns.length - maxTurns;
  while (start < turns.length && turns[start].role !== 'user') {
    start++;
  }
  return turns.slice(start);
}

interface MemorySession {
  turns: ChatTurn[];
  touchedAt: number;
}

export class InMemoryConversationStore implements ConversationStore {
  /** Insertion order is last-touched order; touching a session moves it to the end. */
  private sessions = new Map<string, MemorySession>();

  constructor(
    private maxTurns: number,
    private ttlSeconds: number,
    private now: () => number = () => Date.now()
  ) {}

  async getHistory(sessionId: string): Promise<ChatTurn[]> {
    this.expire();
    return [...(this.sessions.get(sessionId)?.turns ?? [])];
  }

  async append(sessionId: string, turns: ChatTurn[]): Promise<void> {
    this.expire();
    const history = this.sessions.get(sessionId)?.turns ?? [];
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, {
      turns: evict([...history, ...turns], this.maxTurns),
      touchedAt: this.now(),
    });
  }

  async clear(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  private expire(): void {
    const cutoff = this.now() - this.ttlSeconds * 1000;
    for (const [sessionId, session] of this.sessions) {
      if (session.touchedAt > cutoff) break;
      this.sessions.delete(sessionId);
    }
  }
}

/** The subset of the redis client the store needs. */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options: { EX: number }): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

function isChatTurn(value: unknown): value is ChatTurn {
  if (!value || typeof value !== 'object') return false;
  if (!('role' in value) || !('content' in value)) return false;
  return (value.role === 'user' || value.role === 'assistant') && typeof value.content === 'string';
}

export class RedisConversationStore implements ConversationStore {
  constructor(
    private client: KeyValueClient,
    private maxTurns: number,
    private ttlSeconds: number
  ) {}

  async getHistory(sessionId: string): Promise<ChatTurn[]> {
    try {
      const data = await this.client.get(`${KEY_PREFIX}${sessionId}`);
      if (!data) return [];
      const parsed: unknown = JSON.parse(data);
      return Array.isArray(parsed) ? parsed.filter(isChatTurn) : [];
    } catch (error) {
      logger.warn('Conversation history read failed', { sessionId, error: errorMessage(error) });
      return [];
    }
  }

  async append(sessionId: string, turns: ChatTurn[]): Promise<void> {
    const history = await this.getHistory(sessionId);
    try {
      await this.client.set(
        `${KEY_PREFIX}${sessionId}`,
        JSON.stringify(evict([...history, ...turns], this.maxTurns)),
        { EX: this.ttlSeconds }
      );
    } catch (error) {
      logger.warn('Conversation history write failed', { sessionId, error: errorMessage(error) });
    }
  }

  async clear(sessionId: string): Promise<void> {
    try {
      await this.client.del(`${KEY_PREFIX}${sessionId}`);
    } catch (error) {
      logger.warn('Conversation history clear failed', { sessionId, error: errorMessage(error) });
    }
  }
}
