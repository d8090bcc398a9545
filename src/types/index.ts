// Core types for the RAG system

export type FileType = 'pdf' | 'txt' | 'md' | 'html' | 'csv' | 'docx';

/**
 * One ordered piece of extracted text. Units of a document concatenate
 * to its full text; `page` is zero-based, or null for formats without pages.
 */
export interface TextUnit {
  text: string;
  page: number | null;
}

export interface DocumentChunk {
  chunkIndex: number;
  content: string;
  page: number | null;
  // [start, end) character offsets into the concatenated document text
  start: number;
  end: number;
}

export interface DocumentMetadata {
  filename: string;
  fileType: FileType;
  fileSize: number;
  uploadId: string;
  uploadedAt: string;
  totalChunks: number;
}

export interface ChunkRecord {
  id: string;
  filename: string;
  page: number | null;
  chunkIndex: number;
  content: string;
  start: number;
  end: number;
  embedding: number[];
  document: DocumentMetadata;
}

export interface SearchResult {
  chunk: ChunkRecord;
  score: number;
}

export interface DocumentSummary {
  filename: string;
  chunkCount: number;
  metadata: DocumentMetadata;
}

export interface DocumentListing {
  totalDocuments: number;
  totalChunks: number;
  documents: DocumentSummary[];
}

export interface ConversationTurn {
  question: string;
  answer: string;
  askedAt: string;
}

export interface Citation {
  source: string;
  pages: number[];
  snippet: string;
  score: number;
}

export interface IngestOptions {
  fileType?: string;
}

export interface IngestResult {
  filename: string;
  uploadId: string;
  chunksCount: number;
  replacedChunks: number;
  processingTime: number;
}

export interface QueryRequest {
  question: string;
  sessionId?: string;
  limit?: number;
  documents?: string[];
}

export interface QueryResponse {
  answer: string;
  citations: Citation[];
  sessionId: string;
  contextChunks: number;
  usedRetrieval: boolean;
  processingTime: number;
}

// Configuration types
export type EmbeddingProviderName = 'openai' | 'ollama';
export type SessionBackendName = 'memory' | 'cache';

export interface RagConfig {
  chunkSize: number;
  chunkOverlap: number;
  maxResults: number;
  historyWindow: number;
  maxStoredTurns: number;
  maxContextChars: number;
  snippetLength: number;
  vectorDbPath: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  ollamaBaseUrl: string;
  batchSize: number;
  timeoutMs: number;
}

export interface GenerationConfig {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface SessionConfig {
  backend: SessionBackendName;
  ttlSeconds: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin: string;
  maxFileSizeMb: number;
  maxFilesPerUpload: number;
}
