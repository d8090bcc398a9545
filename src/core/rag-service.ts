import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { KeyedMutex } from '../utils/async';
import { createEmbeddingCache } from '../utils/cache';
import { Config } from '../config';
import { LoaderRegistry } from './loaders';
import { TextChunker } from './chunker';
import { Embedder, EmbeddingProvider, OllamaEmbeddingProvider, OpenAIEmbeddingProvider } from './embeddings';
import { Generator, OpenAIGenerationProvider } from './generation';
import { PersistentVectorDB, VectorIndex, chunkId } from './vector-db';
import { CacheSessionStore, InMemorySessionStore, SessionMemory } from './session-memory';
import { buildCitations } from './citations';
import { assemblePrompt } from './prompt';
import {
  ChunkRecord,
  DocumentListing,
  DocumentMetadata,
  IngestOptions,
  IngestResult,
  QueryRequest,
  QueryResponse,
  SearchResult
} from '../types';
import { ErrorContext, IndexError, RagError, ValidationError, errorMessage } from '../types/api';

export const DEFAULT_SESSION_ID = 'default';

export interface RAGServiceSettings {
  chunkSize: number;
  chunkOverlap: number;
  maxResults: number;
  maxContextChars: number;
  snippetLength: number;
}

export interface RAGServiceDeps {
  embedder: Embedder;
  generator: Generator;
  index: VectorIndex;
  memory: SessionMemory;
  loaders?: LoaderRegistry;
  settings: RAGServiceSettings;
}

/**
 * Coordinates ingestion (load, chunk, embed, index) and question answering
 * (embed, search, history, generate, cite, remember).
 */
export class RAGService {
  private readonly embedder: Embedder;
  private readonly generator: Generator;
  private readonly index: VectorIndex;
  private readonly memory: SessionMemory;
  private readonly loaders: LoaderRegistry;
  private readonly chunker: TextChunker;
  private readonly settings: RAGServiceSettings;
  // Ingestion and deletion of one filename never interleave
  private readonly documentLocks = new KeyedMutex();
  private initialized = false;

  constructor(deps: RAGServiceDeps) {
    this.embedder = deps.embedder;
    this.generator = deps.generator;
    this.index = deps.index;
    this.memory = deps.memory;
    this.loaders = deps.loaders ?? new LoaderRegistry();
    this.settings = deps.settings;
    this.chunker = new TextChunker({ chunkSize: deps.settings.chunkSize, chunkOverlap: deps.settings.chunkOverlap });
  }

  /**
   * Initialize all components
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    const startTime = Date.now();
    logger.info('Initializing RAG Service...');
    await this.index.initialize();
    this.initialized = true;
    logger.performance('RAG Service initialization', Date.now() - startTime);
  }

  /**
   * Index a document. Re-ingesting a filename replaces its previous chunks.
   */
  async ingest(filename: string, content: Buffer, options: IngestOptions = {}): Promise<IngestResult> {
    const name = filename.trim();
    if (!name) {
      throw new ValidationError('Filename is required', { operation: 'ingest' });
    }
    await this.initialize();

    return this.documentLocks.runExclusive(name, async () => {
      const startTime = Date.now();
      const context: ErrorContext = { filename: name, operation: 'ingest' };
      logger.info(`Indexing document: ${name}`, { bytes: content.length });

      try {
        const { fileType, units } = await this.loaders.load(name, content, options.fileType);
        const chunks = this.chunker.chunkUnits(units);
        logger.debug(`Created ${chunks.length} chunks`, { filename: name });

        // Nothing touches the index until every chunk has a vector
        const embeddings = await this.embedder.embedDocuments(chunks.map(chunk => chunk.content), context);

        const document: DocumentMetadata = {
          filename: name,
          fileType,
          fileSize: content.length,
          uploadId: uuidv4(),
          uploadedAt: new Date().toISOString(),
          totalChunks: chunks.length
        };

        const records: ChunkRecord[] = chunks.map((chunk, i) => ({
          id: chunkId(name, chunk.chunkIndex),
          filename: name,
          page: chunk.page,
          chunkIndex: chunk.chunkIndex,
          content: chunk.content,
          start: chunk.start,
          end: chunk.end,
          embedding: embeddings[i],
          document
        }));

        const replacedChunks = await this.index.replaceDocument(name, records);
        if (replacedChunks > 0) {
          logger.info(`Replaced ${replacedChunks} existing chunks of ${name}`);
        }

        const processingTime = Date.now() - startTime;
        logger.info('Document indexed successfully', {
          filename: name,
          uploadId: document.uploadId,
          chunks: records.length,
          processingTime: `${processingTime}ms`
        });

        return {
          filename: name,
          uploadId: document.uploadId,
          chunksCount: records.length,
          replacedChunks,
          processingTime
        };
      } catch (error) {
        logger.error('Document indexing failed', error, { ...context });
        throw this.asRagError(error, context);
      }
    });
  }

  /**
   * Answer a question from the indexed documents and the session's recent turns
   */
  async answer(request: QueryRequest): Promise<QueryResponse> {
    const question = request.question?.trim();
    const sessionId = request.sessionId?.trim() || DEFAULT_SESSION_ID;
    const limit = request.limit ?? this.settings.maxResults;
    const context: ErrorContext = { sessionId, operation: 'answer' };

    if (!question) {
      throw new ValidationError('Question is required', context);
    }
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ValidationError('Result limit must be a positive integer', context);
    }
    await this.initialize();

    const startTime = Date.now();
    logger.info(`Processing query in session ${sessionId}`, { question: question.slice(0, 100) });

    try {
      const filter = await this.resolveFilter(request.documents, sessionId);

      const queryEmbedding = await this.embedder.embedQuery(question, context);
      const results = await this.search(queryEmbedding, limit, filter, context);
      if (results.length === 0) {
        logger.info('No document context retrieved, answering from conversation only', { sessionId });
      }

      const history = await this.memory.history(sessionId);
      const { prompt, included } = assemblePrompt({
        question,
        results,
        history,
        maxContextChars: this.settings.maxContextChars
      });

      const answer = await this.generator.generate(prompt, context);
      const citations = buildCitations(included, this.settings.snippetLength);

      await this.memory.append(sessionId, question, answer);

      const processingTime = Date.now() - startTime;
      logger.info('Query processed successfully', {
        sessionId,
        resultsCount: results.length,
        contextChunks: included.length,
        processingTime: `${processingTime}ms`
      });

      return {
        answer,
        citations,
        sessionId,
        contextChunks: included.length,
        usedRetrieval: included.length > 0,
        processingTime
      };
    } catch (error) {
      logger.error('Query failed', error, { ...context });
      throw this.asRagError(error, context);
    }
  }

  /**
   * Delete a document's chunks; returns 0 when the filename is not indexed
   */
  async deleteDocument(filename: string): Promise<number> {
    await this.initialize();
    const name = filename.trim();

    return this.documentLocks.runExclusive(name, async () => {
      try {
        const deleted = await this.index.deleteByFilename(name);
        if (deleted === 0) {
          logger.warn(`Document not found for deletion: ${name}`);
        } else {
          logger.info(`Deleted document '${name}' (${deleted} chunks)`);
        }
        return deleted;
      } catch (error) {
        throw this.asRagError(error, { filename: name, operation: 'delete' });
      }
    });
  }

  async deleteAll(): Promise<number> {
    await this.initialize();
    try {
      const deleted = await this.index.deleteAll();
      logger.info(`Deleted all documents (${deleted} chunks)`);
      return deleted;
    } catch (error) {
      throw this.asRagError(error, { operation: 'delete all' });
    }
  }

  async listDocuments(): Promise<DocumentListing> {
    await this.initialize();
    const documents = await this.index.listDocuments();
    return {
      totalDocuments: documents.length,
      totalChunks: documents.reduce((sum, doc) => sum + doc.chunkCount, 0),
      documents
    };
  }

  async clearSession(sessionId: string): Promise<void> {
    await this.memory.clear(sessionId);
  }

  async setSessionScope(sessionId: string, filenames: string[]): Promise<void> {
    await this.memory.setScope(sessionId, filenames);
  }

  close(): void {
    this.embedder.close();
    this.memory.close();
  }

  /**
   * An explicit filter wins over the session's scope. Unknown filenames are
   * kept (they simply match nothing) and reported.
   */
  private async resolveFilter(documents: string[] | undefined, sessionId: string): Promise<string[] | undefined> {
    const explicit = documents?.map(name => name.trim()).filter(name => name.length > 0);
    const filter = explicit && explicit.length > 0 ? explicit : await this.memory.getScope(sessionId);
    if (!filter) {
      return undefined;
    }

    const indexed = new Set((await this.index.listDocuments()).map(doc => doc.filename));
    const unknown = filter.filter(name => !indexed.has(name));
    if (unknown.length > 0) {
      logger.warn('Filter names documents that are not indexed', { sessionId, unknown });
    }
    return filter;
  }

  private async search(
    queryEmbedding: number[],
    limit: number,
    filter: string[] | undefined,
    context: ErrorContext
  ): Promise<SearchResult[]> {
    try {
      return await this.index.search(queryEmbedding, limit, filter);
    } catch (error) {
      if (error instanceof RagError) throw error;
      throw new IndexError(`Search failed: ${errorMessage(error)}`, context, error);
    }
  }

  private asRagError(error: unknown, context: ErrorContext): RagError {
    if (error instanceof RagError) {
      return error.withContext(context);
    }
    return new RagError(`${context.operation ?? 'operation'} failed: ${errorMessage(error)}`, 'INTERNAL_ERROR', 500, context, {
      cause: error
    });
  }
}

/**
 * Wire the service from configuration
 */
export function createRAGService(config: Config): RAGService {
  const { rag, embeddings, generation, retry, sessions } = config;

  const embeddingProvider: EmbeddingProvider =
    embeddings.provider === 'ollama'
      ? new OllamaEmbeddingProvider({ baseUrl: embeddings.ollamaBaseUrl, model: embeddings.model })
      : new OpenAIEmbeddingProvider({ apiKey: generation.apiKey, baseUrl: generation.baseUrl, model: embeddings.model });

  const store = sessions.backend === 'cache' ? new CacheSessionStore(sessions.ttlSeconds) : new InMemorySessionStore();

  return new RAGService({
    embedder: new Embedder(embeddingProvider, {
      batchSize: embeddings.batchSize,
      timeoutMs: embeddings.timeoutMs,
      retry,
      cache: createEmbeddingCache()
    }),
    generator: new Generator(
      new OpenAIGenerationProvider({
        apiKey: generation.apiKey,
        baseUrl: generation.baseUrl,
        model: generation.model,
        temperature: generation.temperature
      }),
      { timeoutMs: generation.timeoutMs, retry }
    ),
    index: new PersistentVectorDB({ directory: rag.vectorDbPath }),
    memory: new SessionMemory(store, { historyWindow: rag.historyWindow, maxStoredTurns: rag.maxStoredTurns }),
    settings: {
      chunkSize: rag.chunkSize,
      chunkOverlap: rag.chunkOverlap,
      maxResults: rag.maxResults,
      maxContextChars: rag.maxContextChars,
      snippetLength: rag.snippetLength
    }
  });
}
