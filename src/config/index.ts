import {
  EmbeddingConfig,
  EmbeddingProviderName,
  GenerationConfig,
  RagConfig,
  RetryConfig,
  ServerConfig,
  SessionBackendName,
  SessionConfig
} from '../types';
import { ConfigurationError } from '../types/api';

type Env = Record<string, string | undefined>;

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderName, string> = {
  openai: 'text-embedding-3-small',
  ollama: 'nomic-embed-text'
};

function parseEmbeddingProvider(value: string | undefined): EmbeddingProviderName {
  const provider = value || 'openai';
  if (provider !== 'openai' && provider !== 'ollama') {
    throw new ConfigurationError(`EMBEDDING_PROVIDER must be "openai" or "ollama", got "${provider}"`);
  }
  return provider;
}

function parseSessionBackend(value: string | undefined): SessionBackendName {
  const backend = value || 'memory';
  if (backend !== 'memory' && backend !== 'cache') {
    throw new ConfigurationError(`SESSION_BACKEND must be "memory" or "cache", got "${backend}"`);
  }
  return backend;
}

export class Config {
  private static instance: Config;
  public readonly rag: RagConfig;
  public readonly embeddings: EmbeddingConfig;
  public readonly generation: GenerationConfig;
  public readonly retry: RetryConfig;
  public readonly sessions: SessionConfig;
  public readonly server: ServerConfig;

  private constructor(env: Env) {
    this.rag = {
      chunkSize: parseInt(env.RAG_CHUNK_SIZE || '1500'),
      chunkOverlap: parseInt(env.RAG_CHUNK_OVERLAP || '200'),
      maxResults: parseInt(env.RAG_MAX_RESULTS || '6'),
      // Counted in messages: 6 messages = the 3 most recent question/answer turns
      historyWindow: parseInt(env.RAG_HISTORY_WINDOW || '6'),
      maxStoredTurns: parseInt(env.RAG_MAX_STORED_TURNS || '50'),
      maxContextChars: parseInt(env.RAG_MAX_CONTEXT_CHARS || '12000'),
      snippetLength: parseInt(env.RAG_SNIPPET_LENGTH || '240'),
      vectorDbPath: env.VECTOR_DB_PATH || './data/vectors'
    };

    const provider = parseEmbeddingProvider(env.EMBEDDING_PROVIDER);
    this.embeddings = {
      provider,
      model: env.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODELS[provider],
      ollamaBaseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434',
      batchSize: parseInt(env.EMBEDDING_BATCH_SIZE || '64'),
      timeoutMs: parseInt(env.EMBEDDING_TIMEOUT_MS || '30000')
    };

    this.generation = {
      apiKey: env.OPENAI_API_KEY || undefined,
      baseUrl: env.OPENAI_BASE_URL || undefined,
      model: env.GENERATION_MODEL || 'gpt-4o-mini',
      temperature: parseFloat(env.GENERATION_TEMPERATURE || '0'),
      timeoutMs: parseInt(env.GENERATION_TIMEOUT_MS || '60000')
    };

    this.retry = {
      maxAttempts: parseInt(env.SERVICE_MAX_ATTEMPTS || '3'),
      baseDelayMs: parseInt(env.SERVICE_RETRY_BASE_MS || '500')
    };

    this.sessions = {
      backend: parseSessionBackend(env.SESSION_BACKEND),
      ttlSeconds: parseInt(env.SESSION_TTL_SECONDS || '3600')
    };

    this.server = {
      port: parseInt(env.PORT || '8000'),
      host: env.HOST || 'localhost',
      corsOrigin: env.CORS_ORIGIN || 'http://localhost:3000',
      maxFileSizeMb: parseInt(env.MAX_FILE_SIZE_MB || '50'),
      maxFilesPerUpload: parseInt(env.MAX_FILES_PER_UPLOAD || '10')
    };
  }

  public static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config(process.env);
    }
    return Config.instance;
  }

  /**
   * Build a standalone configuration from an explicit environment
   */
  public static fromEnv(env: Env): Config {
    return new Config(env);
  }

  public validate(): void {
    const { rag, embeddings, generation, retry, sessions, server } = this;

    // Validate chunk settings
    if (!(rag.chunkSize > 0)) {
      throw new ConfigurationError('RAG_CHUNK_SIZE must be positive');
    }
    if (!(rag.chunkOverlap >= 0)) {
      throw new ConfigurationError('RAG_CHUNK_OVERLAP must not be negative');
    }
    if (rag.chunkOverlap >= rag.chunkSize) {
      throw new ConfigurationError('RAG_CHUNK_OVERLAP must be less than RAG_CHUNK_SIZE');
    }

    // Validate retrieval and prompt budgets
    if (!(rag.maxResults > 0)) {
      throw new ConfigurationError('RAG_MAX_RESULTS must be positive');
    }
    if (!(rag.historyWindow >= 0)) {
      throw new ConfigurationError('RAG_HISTORY_WINDOW must not be negative');
    }
    if (!(rag.maxStoredTurns * 2 >= rag.historyWindow)) {
      throw new ConfigurationError('RAG_MAX_STORED_TURNS must cover RAG_HISTORY_WINDOW');
    }
    if (!(rag.maxContextChars > 0) || !(rag.snippetLength > 0)) {
      throw new ConfigurationError('RAG_MAX_CONTEXT_CHARS and RAG_SNIPPET_LENGTH must be positive');
    }

    // Validate external service settings
    if (!(embeddings.batchSize > 0)) {
      throw new ConfigurationError('EMBEDDING_BATCH_SIZE must be positive');
    }
    if (!(embeddings.timeoutMs > 0) || !(generation.timeoutMs > 0)) {
      throw new ConfigurationError('EMBEDDING_TIMEOUT_MS and GENERATION_TIMEOUT_MS must be positive');
    }
    if (!(retry.maxAttempts >= 1) || !(retry.baseDelayMs >= 0)) {
      throw new ConfigurationError('SERVICE_MAX_ATTEMPTS must be at least 1 and SERVICE_RETRY_BASE_MS not negative');
    }
    if (!generation.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is required for answer generation');
    }
    if (sessions.backend === 'cache' && !(sessions.ttlSeconds > 0)) {
      throw new ConfigurationError('SESSION_TTL_SECONDS must be positive');
    }

    // Validate server settings
    if (server.port < 1 || server.port > 65535) {
      throw new ConfigurationError('PORT must be between 1 and 65535');
    }
  }
}

export const config = Config.getInstance();
