import { logger } from '../utils/logger';
import { Cache } from '../utils/cache';
import { KeyedMutex } from '../utils/async';
import { ConversationTurn } from '../types';
import { ValidationError } from '../types/api';

export interface SessionRecord {
  turns: ConversationTurn[];
  // Filenames retrieval is restricted to when a question names none
  scope?: string[];
}

/**
 * Backing store for sessions. Swapping it (for a durable key-value store)
 * does not change SessionMemory's contract.
 */
export interface SessionStore {
  get(sessionId: string): Promise<SessionRecord | undefined>;
  set(sessionId: string, record: SessionRecord): Promise<void>;
  delete(sessionId: string): Promise<boolean>;
  close?(): void;
}

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, SessionRecord>();

  async get(sessionId: string): Promise<SessionRecord | undefined> {
    return this.sessions.get(sessionId);
  }

  async set(sessionId: string, record: SessionRecord): Promise<void> {
    this.sessions.set(sessionId, record);
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }
}

/**
 * Sessions that expire after `ttlSeconds` without activity
 */
export class CacheSessionStore implements SessionStore {
  private cache: Cache;
  private readonly ttlSeconds: number;

  constructor(ttlSeconds: number) {
    this.ttlSeconds = ttlSeconds;
    this.cache = new Cache({ name: 'session cache', ttlSeconds, checkPeriodSeconds: Math.min(ttlSeconds, 600) });
  }

  async get(sessionId: string): Promise<SessionRecord | undefined> {
    const record = this.cache.get<SessionRecord>(this.key(sessionId));
    if (record) {
      // Reading counts as activity
      this.cache.set(this.key(sessionId), record, this.ttlSeconds);
    }
    return record;
  }

  async set(sessionId: string, record: SessionRecord): Promise<void> {
    this.cache.set(this.key(sessionId), record, this.ttlSeconds);
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.cache.delete(this.key(sessionId)) > 0;
  }

  close(): void {
    this.cache.close();
  }

  private key(sessionId: string): string {
    return `session:${sessionId}`;
  }
}

export interface SessionMemoryOptions {
  // Most recent messages (question and answer each count as one) fed back into prompts
  historyWindow: number;
  // Turns retained per session; older turns are dropped on append
  maxStoredTurns: number;
}

export class SessionMemory {
  private locks = new KeyedMutex();

  constructor(
    private readonly store: SessionStore = new InMemorySessionStore(),
    private readonly options: SessionMemoryOptions = { historyWindow: 6, maxStoredTurns: 50 }
  ) {
    if (options.historyWindow < 0 || options.maxStoredTurns < 1) {
      throw new ValidationError('History window must be non-negative and at least one turn must be stored');
    }
  }

  get historyTurns(): number {
    return Math.floor(this.options.historyWindow / 2);
  }

  async append(sessionId: string, question: string, answer: string): Promise<void> {
    await this.update(sessionId, record => {
      const turns = [...record.turns, { question, answer, askedAt: new Date().toISOString() }];
      return { ...record, turns: turns.slice(-this.options.maxStoredTurns) };
    });
  }

  /**
   * Most recent turns, oldest first, limited to the configured window
   */
  async history(sessionId: string): Promise<ConversationTurn[]> {
    const record = await this.getOrCreate(sessionId);
    const limit = this.historyTurns;
    return limit === 0 ? [] : record.turns.slice(-limit);
  }

  async clear(sessionId: string): Promise<void> {
    await this.locks.runExclusive(sessionId, async () => {
      await this.store.delete(sessionId);
    });
    logger.info(`Session cleared: ${sessionId}`);
  }

  async setScope(sessionId: string, filenames: string[]): Promise<void> {
    const scope = Array.from(new Set(filenames.map(name => name.trim()).filter(name => name.length > 0)));
    await this.update(sessionId, record => ({ ...record, scope: scope.length > 0 ? scope : undefined }));
  }

  async getScope(sessionId: string): Promise<string[] | undefined> {
    const record = await this.store.get(sessionId);
    return record?.scope;
  }

  close(): void {
    this.store.close?.();
  }

  private async getOrCreate(sessionId: string): Promise<SessionRecord> {
    const existing = await this.store.get(sessionId);
    if (existing) {
      return existing;
    }
    return this.update(sessionId, record => record);
  }

  private update(sessionId: string, change: (record: SessionRecord) => SessionRecord): Promise<SessionRecord> {
    return this.locks.runExclusive(sessionId, async () => {
      const current = (await this.store.get(sessionId)) ?? { turns: [] };
      const next = change(current);
      await this.store.set(sessionId, next);
      return next;
    });
  }
}
