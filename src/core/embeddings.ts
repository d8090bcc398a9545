import OpenAI from 'openai';
import { logger } from '../utils/logger';
import { Cache } from '../utils/cache';
import { retry, withTimeout } from '../utils/async';
import { EmbeddingError, ErrorContext, RagError, errorMessage } from '../types/api';
import { RetryConfig } from '../types';

/**
 * An external embedding service. Implementations return one vector per input,
 * in input order, and should stop work when `signal` aborts.
 */
export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: string[], signal: AbortSignal): Promise<number[][]>;
}

export interface OllamaEmbeddingOptions {
  baseUrl: string;
  model: string;
}

/**
 * Calls a local Ollama server. Its embeddings endpoint takes one prompt per
 * request, so a batch is sent text by text.
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  public readonly model: string;
  private readonly baseUrl: string;

  constructor(options: OllamaEmbeddingOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async embed(texts: string[], signal: AbortSignal): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (const text of texts) {
      embeddings.push(await this.embedOne(text, signal));
    }
    return embeddings;
  }

  private async embedOne(text: string, signal: AbortSignal): Promise<number[]> {
    const res = await fetch(`${this.baseUrl}/api/embeddings`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ model: this.model, prompt: text }),
      signal
    });

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      const message = `Ollama embeddings request failed: ${res.status} ${res.statusText}\n${body}`;
      // status lets the retry policy tell overload from a bad request
      throw Object.assign(new Error(message), { status: res.status });
    }

    const data: unknown = await res.json();
    if (typeof data !== 'object' || data === null || !('embedding' in data) || !Array.isArray(data.embedding)) {
      throw new Error('Ollama embeddings response missing embedding array');
    }

    const vector: number[] = [];
    for (const value of data.embedding) {
      vector.push(typeof value === 'number' ? value : Number.NaN);
    }
    return vector;
  }
}

export interface OpenAIEmbeddingOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  public readonly model: string;
  private client: OpenAI;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model;
    // Retries and timeouts are handled by the Embedder
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
  }

  async embed(texts: string[], signal: AbortSignal): Promise<number[][]> {
    const response = await this.client.embeddings.create({ model: this.model, input: texts }, { signal });
    return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
  }
}

export interface EmbedderOptions {
  batchSize: number;
  timeoutMs: number;
  retry: RetryConfig;
  cache?: Cache;
}

/**
 * Batches, caches, times out and retries calls to an EmbeddingProvider.
 * A batch either yields one vector per text or the whole call fails with
 * an EmbeddingError.
 */
export class Embedder {
  private dimension: number | null = null;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbedderOptions
  ) {}

  get model(): string {
    return this.provider.model;
  }

  /**
   * Generate embeddings for multiple texts (with batching for performance)
   */
  async embedDocuments(texts: string[], context: ErrorContext = {}): Promise<number[][]> {
    const startTime = Date.now();
    const embeddings: Array<number[] | undefined> = texts.map(text => this.options.cache?.getEmbedding(this.model, text));
    const missing = texts.map((_text, index) => index).filter(index => embeddings[index] === undefined);

    logger.debug(`Generating embeddings for ${missing.length}/${texts.length} texts (batched)`);

    for (let batchStart = 0; batchStart < missing.length; batchStart += this.options.batchSize) {
      const batchIndexes = missing.slice(batchStart, batchStart + this.options.batchSize);
      const batch = batchIndexes.map(index => texts[index]);
      const vectors = await this.embedBatch(batch, context);

      batchIndexes.forEach((textIndex, i) => {
        embeddings[textIndex] = vectors[i];
        this.options.cache?.setEmbedding(this.model, texts[textIndex], vectors[i]);
      });
    }

    const result: number[][] = [];
    for (const embedding of embeddings) {
      if (!embedding) {
        throw new EmbeddingError('Embedding missing after generation', context);
      }
      result.push(embedding);
    }

    if (texts.length > 0) {
      logger.performance('Embedding generation', Date.now() - startTime, {
        textsCount: texts.length,
        generated: missing.length
      });
    }

    return result;
  }

  /**
   * Generate embedding for a single query
   */
  async embedQuery(query: string, context: ErrorContext = {}): Promise<number[]> {
    const [embedding] = await this.embedDocuments([query], { operation: 'embed query', ...context });
    return embedding;
  }

  close(): void {
    this.options.cache?.close();
  }

  private async embedBatch(batch: string[], context: ErrorContext): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await retry(
        () => withTimeout('embedding request', this.options.timeoutMs, signal => this.provider.embed(batch, signal)),
        {
          maxAttempts: this.options.retry.maxAttempts,
          baseDelayMs: this.options.retry.baseDelayMs,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(`Embedding attempt ${attempt} failed, retrying in ${delayMs}ms`, {
              error: errorMessage(error),
              ...context
            });
          }
        }
      );
    } catch (error) {
      logger.error('Embedding generation failed', error, { ...context });
      const reason = error instanceof RagError ? error.message : errorMessage(error);
      throw new EmbeddingError(`Failed to generate embeddings: ${reason}`, context, error);
    }

    this.checkVectors(batch, vectors, context);
    return vectors;
  }

  private checkVectors(batch: string[], vectors: number[][], context: ErrorContext): void {
    if (vectors.length !== batch.length) {
      throw new EmbeddingError(`Embedding service returned ${vectors.length} vectors for ${batch.length} texts`, context);
    }

    for (const vector of vectors) {
      if (vector.length === 0 || vector.some(value => !Number.isFinite(value))) {
        throw new EmbeddingError('Embedding service returned an empty or non-numeric vector', context);
      }
      if (this.dimension === null) {
        this.dimension = vector.length;
      } else if (vector.length !== this.dimension) {
        throw new EmbeddingError(
          `Inconsistent embedding dimension: expected ${this.dimension}, got ${vector.length}`,
          context
        );
      }
    }
  }
}
