import { EmbeddingProvider, Embedder } from '../src/core/embeddings';
import { GenerationProvider, Generator } from '../src/core/generation';
import { GenerationPrompt } from '../src/core/prompt';
import { PersistentVectorDB, chunkId } from '../src/core/vector-db';
import { SessionMemory, InMemorySessionStore } from '../src/core/session-memory';
import { DocumentLoader, LoaderRegistry, PAGE_SEPARATOR } from '../src/core/loaders';
import { RAGService, RAGServiceSettings } from '../src/core/rag-service';
import { ChunkRecord, DocumentMetadata, FileType, SearchResult, TextUnit } from '../src/types';
import { sleep } from '../src/utils/async';

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Bag-of-words vectors: every distinct token gets its own dimension the first
 * time it is seen, so unrelated words never collide.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-embedding';
  readonly calls: string[][] = [];
  private vocabulary = new Map<string, number>();

  constructor(
    private readonly dimension = 512,
    private readonly delayMs = 0
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
    return texts.map(text => this.vectorFor(text));
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      let index = this.vocabulary.get(token);
      if (index === undefined) {
        index = this.vocabulary.size % this.dimension;
        this.vocabulary.set(token, index);
      }
      vector[index] += 1;
    }
    return vector;
  }
}

export class FakeGenerationProvider implements GenerationProvider {
  readonly model = 'fake-generation';
  readonly prompts: GenerationPrompt[] = [];

  constructor(private readonly reply: (prompt: GenerationPrompt) => string = prompt => `Answer to: ${prompt.question}`) {}

  async generate(prompt: GenerationPrompt): Promise<string> {
    this.prompts.push(prompt);
    return this.reply(prompt);
  }
}

/**
 * Treats form feeds as page breaks so tests can build paged documents from text
 */
export class PagedTextLoader implements DocumentLoader {
  readonly fileTypes: readonly FileType[] = ['txt'];

  async extract(content: Buffer): Promise<TextUnit[]> {
    const pages = content.toString('utf-8').split('\f');
    return pages.map((text, page) => ({
      text: page < pages.length - 1 ? text + PAGE_SEPARATOR : text,
      page
    }));
  }
}

export const TEST_SETTINGS: RAGServiceSettings = {
  chunkSize: 1500,
  chunkOverlap: 200,
  maxResults: 6,
  maxContextChars: 12000,
  snippetLength: 240
};

export const FAST_RETRY = { maxAttempts: 3, baseDelayMs: 0 };

export interface TestService {
  service: RAGService;
  embeddingProvider: FakeEmbeddingProvider;
  generationProvider: FakeGenerationProvider;
  index: PersistentVectorDB;
  memory: SessionMemory;
}

export function createTestService(
  options: {
    settings?: Partial<RAGServiceSettings>;
    embeddingProvider?: FakeEmbeddingProvider;
    generationProvider?: FakeGenerationProvider;
    index?: PersistentVectorDB;
    historyWindow?: number;
  } = {}
): TestService {
  const embeddingProvider = options.embeddingProvider ?? new FakeEmbeddingProvider();
  const generationProvider = options.generationProvider ?? new FakeGenerationProvider();
  const index = options.index ?? new PersistentVectorDB();
  const memory = new SessionMemory(new InMemorySessionStore(), {
    historyWindow: options.historyWindow ?? 6,
    maxStoredTurns: 50
  });

  const loaders = new LoaderRegistry();
  loaders.register(new PagedTextLoader());

  const service = new RAGService({
    embedder: new Embedder(embeddingProvider, { batchSize: 16, timeoutMs: 1000, retry: FAST_RETRY }),
    generator: new Generator(generationProvider, { timeoutMs: 1000, retry: FAST_RETRY }),
    index,
    memory,
    loaders,
    settings: { ...TEST_SETTINGS, ...options.settings }
  });

  return { service, embeddingProvider, generationProvider, index, memory };
}

export function documentMetadata(filename: string, totalChunks = 1, fileType: FileType = 'txt'): DocumentMetadata {
  return {
    filename,
    fileType,
    fileSize: 100,
    uploadId: `upload-${filename}`,
    uploadedAt: '2024-01-01T00:00:00.000Z',
    totalChunks
  };
}

export function makeRecord(
  filename: string,
  chunkIndex: number,
  embedding: number[],
  options: { page?: number | null; content?: string } = {}
): ChunkRecord {
  const content = options.content ?? `${filename} chunk ${chunkIndex}`;
  return {
    id: chunkId(filename, chunkIndex),
    filename,
    page: options.page === undefined ? null : options.page,
    chunkIndex,
    content,
    start: 0,
    end: content.length,
    embedding,
    document: documentMetadata(filename)
  };
}

export function makeResult(
  filename: string,
  page: number | null,
  score: number,
  content = `${filename} page ${page ?? 'none'}`
): SearchResult {
  return { chunk: makeRecord(filename, 0, [1], { page, content }), score };
}
