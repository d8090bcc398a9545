import NodeCache from 'node-cache';
import { createHash } from 'crypto';
import { logger } from './logger';

export interface CacheOptions {
  // Seconds; 0 keeps entries until they are deleted
  ttlSeconds?: number;
  checkPeriodSeconds?: number;
  name?: string;
}

export class Cache {
  private cache: NodeCache;
  private readonly name: string;

  constructor(options: CacheOptions = {}) {
    this.name = options.name || 'cache';
    this.cache = new NodeCache({
      stdTTL: options.ttlSeconds ?? 3600,
      checkperiod: options.checkPeriodSeconds ?? 600,
      useClones: false, // Don't clone objects for better performance
      deleteOnExpire: true
    });

    this.cache.on('expired', (key: string) => {
      logger.debug(`${this.name} expired: ${key}`);
    });
  }

  public set<T>(key: string, value: T, ttl?: number): boolean {
    if (ttl !== undefined) {
      return this.cache.set(key, value, ttl);
    }
    return this.cache.set(key, value);
  }

  public get<T>(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  public delete(key: string): number {
    return this.cache.del(key);
  }

  /**
   * Stop the expiry timer so the process can exit
   */
  public close(): void {
    this.cache.close();
  }

  // Specialized methods for RAG
  public setEmbedding(model: string, text: string, embedding: number[]): boolean {
    return this.set(this.embeddingKey(model, text), embedding);
  }

  public getEmbedding(model: string, text: string): number[] | undefined {
    return this.get<number[]>(this.embeddingKey(model, text));
  }

  private embeddingKey(model: string, text: string): string {
    return `embedding:${model}:${createHash('sha256').update(text).digest('hex')}`;
  }
}

export function createEmbeddingCache(): Cache {
  return new Cache({ name: 'embedding cache', ttlSeconds: 3600 });
}
