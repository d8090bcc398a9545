import OpenAI from 'openai';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { Embedder, EmbeddingProvider, OllamaEmbeddingProvider } from '../src/core/embeddings';
import { Cache } from '../src/utils/cache';
import { EmbeddingError, TransientServiceError } from '../src/types/api';
import { FAST_RETRY } from './helpers';

type Step = (texts: string[], signal: AbortSignal) => Promise<number[][]>;

const lengths = (texts: string[]) => texts.map(text => [text.length, 1]);

/**
 * Plays back one step per call, then keeps answering with the last one
 */
class ScriptedProvider implements EmbeddingProvider {
  readonly model = 'scripted';
  readonly calls: string[][] = [];

  constructor(private readonly steps: Step[]) {}

  embed(texts: string[], signal: AbortSignal): Promise<number[][]> {
    this.calls.push([...texts]);
    const step = this.steps[Math.min(this.calls.length, this.steps.length) - 1];
    return step(texts, signal);
  }
}

const succeed: Step = async texts => lengths(texts);

function embedder(provider: EmbeddingProvider, options: { batchSize?: number; timeoutMs?: number; cache?: Cache } = {}) {
  return new Embedder(provider, {
    batchSize: options.batchSize ?? 16,
    timeoutMs: options.timeoutMs ?? 1000,
    retry: FAST_RETRY,
    cache: options.cache
  });
}

describe('Embedder', () => {
  let cache: Cache | undefined;

  afterEach(() => {
    cache?.close();
    cache = undefined;
  });

  it('returns one vector per text in input order', async () => {
    const provider = new ScriptedProvider([succeed]);

    const vectors = await embedder(provider).embedDocuments(['a', 'bbb', 'cc']);

    expect(vectors).toEqual([
      [1, 1],
      [3, 1],
      [2, 1]
    ]);
  });

  it('splits large inputs into batches', async () => {
    const provider = new ScriptedProvider([succeed]);

    await embedder(provider, { batchSize: 2 }).embedDocuments(['a', 'b', 'c', 'd', 'e']);

    expect(provider.calls).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('embeds a query as a single vector', async () => {
    const provider = new ScriptedProvider([succeed]);

    expect(await embedder(provider).embedQuery('four')).toEqual([4, 1]);
  });

  it('only sends texts missing from the cache', async () => {
    cache = new Cache({ name: 'test cache', ttlSeconds: 0 });
    const provider = new ScriptedProvider([succeed]);
    const cached = embedder(provider, { cache });

    await cached.embedDocuments(['a', 'bb']);
    const vectors = await cached.embedDocuments(['bb', 'ccc']);

    expect(provider.calls).toEqual([['a', 'bb'], ['ccc']]);
    expect(vectors).toEqual([
      [2, 1],
      [3, 1]
    ]);
  });

  it('retries transient failures', async () => {
    const provider = new ScriptedProvider([
      async () => {
        throw new TransientServiceError('rate limited');
      },
      async () => {
        throw Object.assign(new Error('upstream overloaded'), { status: 503 });
      },
      succeed
    ]);

    expect(await embedder(provider).embedDocuments(['ab'])).toEqual([[2, 1]]);
    expect(provider.calls).toHaveLength(3);
  });

  it('retries when the client loses its connection', async () => {
    const provider = new ScriptedProvider([
      async () => {
        throw new OpenAI.APIConnectionError({ cause: new Error('read ECONNRESET') });
      },
      succeed
    ]);

    expect(await embedder(provider).embedDocuments(['abc'])).toEqual([[3, 1]]);
    expect(provider.calls).toHaveLength(2);
  });

  it('gives up after the configured number of attempts', async () => {
    const provider = new ScriptedProvider([
      async () => {
        throw new TransientServiceError('rate limited');
      }
    ]);

    const failure = embedder(provider).embedDocuments(['ab'], { filename: 'doc.txt' });

    await expect(failure).rejects.toBeInstanceOf(EmbeddingError);
    await expect(failure).rejects.toMatchObject({
      message: 'Failed to generate embeddings: rate limited',
      context: { filename: 'doc.txt', operation: 'embed' }
    });
    expect(provider.calls).toHaveLength(FAST_RETRY.maxAttempts);
  });

  it('does not retry permanent failures', async () => {
    const provider = new ScriptedProvider([
      async () => {
        throw Object.assign(new Error('invalid api key'), { status: 401 });
      }
    ]);

    await expect(embedder(provider).embedDocuments(['ab'])).rejects.toThrow(
      'Failed to generate embeddings: invalid api key'
    );
    expect(provider.calls).toHaveLength(1);
  });

  it('times out slow requests and aborts them', async () => {
    const signals: AbortSignal[] = [];
    const provider = new ScriptedProvider([
      (_texts, signal) => {
        signals.push(signal);
        return new Promise<number[][]>(() => undefined);
      }
    ]);

    await expect(embedder(provider, { timeoutMs: 20 }).embedDocuments(['ab'])).rejects.toThrow(
      'Failed to generate embeddings: embedding request timed out after 20ms'
    );
    expect(signals).toHaveLength(FAST_RETRY.maxAttempts);
    expect(signals.every(signal => signal.aborted)).toBe(true);
  });

  it('rejects a response with the wrong number of vectors', async () => {
    const provider = new ScriptedProvider([async () => [[1, 1]]]);

    await expect(embedder(provider).embedDocuments(['a', 'b'])).rejects.toThrow(
      'Embedding service returned 1 vectors for 2 texts'
    );
  });

  it('rejects vectors whose dimension changes between calls', async () => {
    const provider = new ScriptedProvider([succeed, async texts => texts.map(() => [1, 2, 3])]);
    const instance = embedder(provider);

    await instance.embedDocuments(['a']);

    await expect(instance.embedDocuments(['b'])).rejects.toThrow('Inconsistent embedding dimension: expected 2, got 3');
  });

  it('rejects non-numeric vectors', async () => {
    const provider = new ScriptedProvider([async () => [[Number.NaN, 1]]]);

    await expect(embedder(provider).embedDocuments(['a'])).rejects.toThrow(
      'Embedding service returned an empty or non-numeric vector'
    );
  });
});

describe('OllamaEmbeddingProvider', () => {
  const requests: Array<{ url: string; body: unknown }> = [];

  function stubOllama(reply: (prompt: string, call: number) => Response) {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (url: string, init?: { body?: unknown }) => {
        const body: unknown = JSON.parse(String(init?.body));
        requests.push({ url, body });
        const prompt = typeof body === 'object' && body !== null && 'prompt' in body ? String(body.prompt) : '';
        return reply(prompt, requests.length);
      })
    );
  }

  const vectorFor = (prompt: string) => Response.json({ embedding: [prompt.length, 0.5] });

  afterEach(() => {
    vi.unstubAllGlobals();
    requests.length = 0;
  });

  it('sends one request per text and keeps input order', async () => {
    stubOllama(vectorFor);
    const provider = new OllamaEmbeddingProvider({ baseUrl: 'http://ollama.test/', model: 'nomic-embed-text' });

    const vectors = await provider.embed(['one', 'three'], new AbortController().signal);

    expect(vectors).toEqual([
      [3, 0.5],
      [5, 0.5]
    ]);
    expect(requests).toEqual([
      { url: 'http://ollama.test/api/embeddings', body: { model: 'nomic-embed-text', prompt: 'one' } },
      { url: 'http://ollama.test/api/embeddings', body: { model: 'nomic-embed-text', prompt: 'three' } }
    ]);
  });

  it('is retried by the embedder when the server is overloaded', async () => {
    stubOllama((prompt, call) =>
      call === 1 ? new Response('busy', { status: 503, statusText: 'Service Unavailable' }) : vectorFor(prompt)
    );
    const provider = new OllamaEmbeddingProvider({ baseUrl: 'http://ollama.test', model: 'nomic-embed-text' });

    expect(await embedder(provider).embedDocuments(['four'])).toEqual([[4, 0.5]]);
    expect(requests).toHaveLength(2);
  });

  it('does not retry a rejected request', async () => {
    stubOllama(() => new Response('model "missing" not found', { status: 404, statusText: 'Not Found' }));
    const provider = new OllamaEmbeddingProvider({ baseUrl: 'http://ollama.test', model: 'missing' });

    await expect(embedder(provider).embedDocuments(['text'])).rejects.toThrow(
      'Failed to generate embeddings: Ollama embeddings request failed: 404 Not Found\nmodel "missing" not found'
    );
    expect(requests).toHaveLength(1);
  });

  it('rejects a response without an embedding array', async () => {
    stubOllama(() => Response.json({ error: 'nothing here' }));
    const provider = new OllamaEmbeddingProvider({ baseUrl: 'http://ollama.test', model: 'nomic-embed-text' });

    await expect(provider.embed(['text'], new AbortController().signal)).rejects.toThrow(
      'Ollama embeddings response missing embedding array'
    );
  });
});
