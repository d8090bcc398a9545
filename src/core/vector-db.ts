import { promises as fs } from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger';
import { KeyedMutex } from '../utils/async';
import { ChunkRecord, DocumentMetadata, DocumentSummary, FileType, SearchResult } from '../types';
import { IndexError, RagError, errorMessage } from '../types/api';

const INDEX_FILE = 'index.json';
const STORE_VERSION = 1;

/**
 * Entry id for a chunk. Derived from the filename and chunk index only, so the
 * chunks of a filename are exactly the ids `chunkId(filename, 0..n-1)`.
 */
export function chunkId(filename: string, chunkIndex: number): string {
  return `${encodeURIComponent(filename)}#${chunkIndex}`;
}

export interface VectorIndex {
  initialize(): Promise<void>;
  /** Add or replace entries; all records of one call become visible together. */
  upsert(records: ChunkRecord[]): Promise<number>;
  /** Swap every chunk of a filename for `records` in one step; returns how many were removed. */
  replaceDocument(filename: string, records: ChunkRecord[]): Promise<number>;
  search(queryEmbedding: number[], limit: number, filenames?: readonly string[]): Promise<SearchResult[]>;
  deleteByFilename(filename: string): Promise<number>;
  deleteAll(): Promise<number>;
  listDocuments(): Promise<DocumentSummary[]>;
}

interface StoredEntry {
  seq: number;
  record: ChunkRecord;
}

interface StoredIndex {
  version: number;
  nextSeq: number;
  entries: StoredEntry[];
}

// Callers get copies so they cannot edit stored entries in place
function copyRecord(record: ChunkRecord): ChunkRecord {
  return { ...record, embedding: [...record.embedding], document: { ...record.document } };
}

/**
 * Cosine similarity calculation
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

const FILE_TYPES: readonly string[] = ['pdf', 'txt', 'md', 'html', 'csv', 'docx'] satisfies readonly FileType[];

function isFileType(value: unknown): value is FileType {
  return typeof value === 'string' && FILE_TYPES.includes(value);
}

function parseMetadata(value: unknown): DocumentMetadata | null {
  if (!isRecord(value)) return null;
  const { filename, fileType, fileSize, uploadId, uploadedAt, totalChunks } = value;
  if (
    typeof filename !== 'string' ||
    !isFileType(fileType) ||
    typeof fileSize !== 'number' ||
    typeof uploadId !== 'string' ||
    typeof uploadedAt !== 'string' ||
    typeof totalChunks !== 'number'
  ) {
    return null;
  }
  return { filename, fileType, fileSize, uploadId, uploadedAt, totalChunks };
}

function parseRecord(value: unknown): ChunkRecord | null {
  if (!isRecord(value)) return null;
  const { id, filename, page, chunkIndex, content, start, end, embedding } = value;
  const document = parseMetadata(value.document);
  if (
    typeof id !== 'string' ||
    typeof filename !== 'string' ||
    !(page === null || typeof page === 'number') ||
    typeof chunkIndex !== 'number' ||
    typeof content !== 'string' ||
    typeof start !== 'number' ||
    typeof end !== 'number' ||
    !Array.isArray(embedding) ||
    !embedding.every((x): x is number => typeof x === 'number') ||
    !document
  ) {
    return null;
  }
  return { id, filename, page, chunkIndex, content, start, end, embedding, document };
}

function parseStoredIndex(raw: unknown): StoredIndex {
  if (!isRecord(raw) || raw.version !== STORE_VERSION || !Array.isArray(raw.entries) || typeof raw.nextSeq !== 'number') {
    throw new Error('unrecognised index file format');
  }

  const entries: StoredEntry[] = [];
  for (const entry of raw.entries) {
    const record = isRecord(entry) ? parseRecord(entry.record) : null;
    if (!isRecord(entry) || typeof entry.seq !== 'number' || !record) {
      throw new Error('corrupt entry in index file');
    }
    entries.push({ seq: entry.seq, record });
  }

  return { version: STORE_VERSION, nextSeq: raw.nextSeq, entries };
}

export interface PersistentVectorDBOptions {
  // Directory holding index.json; omit for a memory-only index
  directory?: string;
}

/**
 * Vector index kept in memory and persisted as a JSON snapshot.
 *
 * Similarity is cosine; results are ordered by score, then by insertion order.
 * Mutations are serialized and each one writes a full snapshot (temp file +
 * rename) before the in-memory state is swapped, so searches see either the
 * state before a mutation or after it, never part of one.
 */
export class PersistentVectorDB implements VectorIndex {
  private entries: StoredEntry[] = [];
  private nextSeq = 0;
  private initialized = false;
  private initializing: Promise<void> | null = null;
  private writes = new KeyedMutex();
  private readonly filePath: string | null;

  constructor(options: PersistentVectorDBOptions = {}) {
    this.filePath = options.directory ? path.join(options.directory, INDEX_FILE) : null;
  }

  /**
   * Initialize the database
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    if (!this.initializing) {
      this.initializing = this.loadFromDisk().finally(() => {
        this.initializing = null;
      });
    }
    await this.initializing;
  }

  async upsert(records: ChunkRecord[]): Promise<number> {
    if (records.length === 0) return 0;
    records.forEach(record => this.checkRecord(record));

    return this.mutate('upsert', current => {
      const incoming = new Set(records.map(record => record.id));
      const kept = current.entries.filter(entry => !incoming.has(entry.record.id));
      let seq = current.nextSeq;
      const added = records.map(record => ({ seq: seq++, record }));
      return {
        next: { entries: [...kept, ...added], nextSeq: seq },
        result: records.length
      };
    });
  }

  async replaceDocument(filename: string, records: ChunkRecord[]): Promise<number> {
    records.forEach(record => {
      this.checkRecord(record);
      if (record.filename !== filename) {
        throw new IndexError(`Chunk ${record.id} does not belong to ${filename}`, { filename, operation: 'replace' });
      }
    });

    return this.mutate('replace', current => {
      const kept = current.entries.filter(entry => entry.record.filename !== filename);
      let seq = current.nextSeq;
      const added = records.map(record => ({ seq: seq++, record }));
      return {
        next: { entries: [...kept, ...added], nextSeq: seq },
        result: current.entries.length - kept.length
      };
    }, filename);
  }

  /**
   * Search for the `limit` most similar chunks, optionally restricted to filenames
   */
  async search(queryEmbedding: number[], limit: number, filenames?: readonly string[]): Promise<SearchResult[]> {
    await this.initialize();
    const startTime = Date.now();

    if (limit <= 0 || this.entries.length === 0) {
      return [];
    }

    const dimension = this.entries[0].record.embedding.length;
    if (queryEmbedding.length !== dimension) {
      throw new IndexError(`Query vector has dimension ${queryEmbedding.length}, index uses ${dimension}`, {
        operation: 'search'
      });
    }

    const allowed = filenames && filenames.length > 0 ? new Set(filenames) : null;
    const scored = this.entries
      .filter(entry => !allowed || allowed.has(entry.record.filename))
      .map(entry => ({ entry, score: cosineSimilarity(queryEmbedding, entry.record.embedding) }));

    scored.sort((a, b) => b.score - a.score || a.entry.seq - b.entry.seq);

    const results = scored.slice(0, limit).map(({ entry, score }) => ({ chunk: copyRecord(entry.record), score }));

    logger.performance('Vector search', Date.now() - startTime, {
      candidates: scored.length,
      resultsCount: results.length
    });

    return results;
  }

  async deleteByFilename(filename: string): Promise<number> {
    return this.mutate('delete', current => {
      const kept = current.entries.filter(entry => entry.record.filename !== filename);
      return {
        next: { entries: kept, nextSeq: current.nextSeq },
        result: current.entries.length - kept.length
      };
    }, filename);
  }

  async deleteAll(): Promise<number> {
    return this.mutate('delete all', current => ({
      next: { entries: [], nextSeq: current.nextSeq },
      result: current.entries.length
    }));
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    await this.initialize();

    const documents = new Map<string, DocumentSummary>();
    for (const { record } of this.entries) {
      const summary = documents.get(record.filename);
      if (summary) {
        summary.chunkCount++;
      } else {
        documents.set(record.filename, { filename: record.filename, chunkCount: 1, metadata: { ...record.document } });
      }
    }
    return Array.from(documents.values());
  }

  async count(): Promise<number> {
    await this.initialize();
    return this.entries.length;
  }

  private checkRecord(record: ChunkRecord): void {
    if (!record.filename || !Number.isInteger(record.chunkIndex) || record.chunkIndex < 0) {
      throw new IndexError('Chunk records need a filename and a non-negative chunk index', {
        filename: record.filename,
        operation: 'upsert'
      });
    }
    if (record.id !== chunkId(record.filename, record.chunkIndex)) {
      throw new IndexError(`Chunk id ${record.id} does not match its filename and index`, {
        filename: record.filename,
        operation: 'upsert'
      });
    }
    if (record.embedding.length === 0) {
      throw new IndexError('Chunk records need an embedding', { filename: record.filename, operation: 'upsert' });
    }
  }

  /**
   * Apply a change: compute the next state, persist it, then publish it
   */
  private async mutate<T>(
    operation: string,
    change: (current: { entries: StoredEntry[]; nextSeq: number }) => {
      next: { entries: StoredEntry[]; nextSeq: number };
      result: T;
    },
    filename?: string
  ): Promise<T> {
    await this.initialize();

    return this.writes.runExclusive('index', async () => {
      const startTime = Date.now();
      const { next, result } = change({ entries: this.entries, nextSeq: this.nextSeq });

      const dimensions = new Set(next.entries.map(entry => entry.record.embedding.length));
      if (dimensions.size > 1) {
        throw new IndexError(`Embedding dimensions would be mixed: ${Array.from(dimensions).join(', ')}`, {
          filename,
          operation
        });
      }

      try {
        await this.saveToDisk(next);
      } catch (error) {
        logger.error(`Vector index ${operation} failed`, error, { filename });
        throw new IndexError(`Vector index ${operation} failed: ${errorMessage(error)}`, { filename, operation }, error);
      }

      this.entries = next.entries;
      this.nextSeq = next.nextSeq;

      logger.performance(`Vector index ${operation}`, Date.now() - startTime, {
        filename,
        entries: this.entries.length
      });

      return result;
    });
  }

  /**
   * Save a snapshot to disk (temp file + rename)
   */
  private async saveToDisk(state: { entries: StoredEntry[]; nextSeq: number }): Promise<void> {
    if (!this.filePath) return;

    const snapshot: StoredIndex = { version: STORE_VERSION, nextSeq: state.nextSeq, entries: state.entries };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(snapshot));
    await fs.rename(tempPath, this.filePath);
    logger.debug(`Saved vector index to ${this.filePath}`);
  }

  /**
   * Load the snapshot written by a previous process, if any
   */
  private async loadFromDisk(): Promise<void> {
    if (this.filePath) {
      let raw: string | null = null;
      try {
        raw = await fs.readFile(this.filePath, 'utf-8');
      } catch (error) {
        if (!(isRecord(error) && error.code === 'ENOENT')) {
          throw new IndexError(`Vector index could not be read: ${errorMessage(error)}`, { operation: 'initialize' }, error);
        }
      }

      if (raw !== null) {
        try {
          const stored = parseStoredIndex(JSON.parse(raw));
          this.entries = stored.entries.sort((a, b) => a.seq - b.seq);
          this.nextSeq = stored.nextSeq;
        } catch (error) {
          if (error instanceof RagError) throw error;
          throw new IndexError(`Vector index at ${this.filePath} is unreadable: ${errorMessage(error)}`, {
            operation: 'initialize'
          }, error);
        }
      }
    }

    this.initialized = true;
    logger.info(`Vector index loaded ${this.entries.length} chunks`, { path: this.filePath ?? 'memory' });
  }
}
