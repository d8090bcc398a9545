import { logger } from '../utils/logger';
import { DocumentChunk, TextUnit } from '../types';
import { ValidationError } from '../types/api';

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

// Preferred cut points, strongest first
const SEPARATORS = ['\n\n', '\n', ' '];

interface UnitSpan {
  start: number;
  end: number;
  page: number | null;
}

export class TextChunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  constructor(options: ChunkOptions) {
    TextChunker.validate(options);
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
  }

  static validate({ chunkSize, chunkOverlap }: ChunkOptions): void {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError('Chunk size must be a positive integer');
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
      throw new ValidationError('Chunk overlap must be a non-negative integer');
    }
    if (chunkOverlap >= chunkSize) {
      throw new ValidationError('Overlap size must be less than chunk size');
    }
  }

  /**
   * Split a document's text units into overlapping chunks.
   *
   * Text is accumulated across units up to `chunkSize` characters. A cut prefers
   * the last paragraph, line or word break in the second half of the window and
   * falls back to a hard cut. The next chunk starts `chunkOverlap` characters
   * before the previous cut. Each chunk takes the page of its first character.
   */
  chunkUnits(units: TextUnit[]): DocumentChunk[] {
    const text = units.map(unit => unit.text).join('');
    const spans = this.unitSpans(units);
    const chunks: DocumentChunk[] = [];

    if (text.length === 0) {
      return chunks;
    }

    let start = 0;
    for (;;) {
      const hardEnd = Math.min(start + this.chunkSize, text.length);
      const end = hardEnd === text.length ? hardEnd : this.findCut(text, start, hardEnd);

      chunks.push({
        chunkIndex: chunks.length,
        content: text.slice(start, end),
        page: this.pageAt(spans, start),
        start,
        end
      });

      if (end >= text.length) {
        break;
      }
      start = Math.max(end - this.chunkOverlap, start + 1);
    }

    logger.debug(`Text chunked: ${chunks.length} chunks from ${text.length} characters`);
    return chunks;
  }

  chunkText(text: string): DocumentChunk[] {
    return this.chunkUnits([{ text, page: null }]);
  }

  /**
   * Rebuild the chunked text by dropping each chunk's overlap with its predecessor
   */
  static reconstruct(chunks: DocumentChunk[]): string {
    let text = '';
    let covered = 0;
    for (const chunk of chunks) {
      text += chunk.content.slice(Math.max(covered - chunk.start, 0));
      covered = chunk.end;
    }
    return text;
  }

  private findCut(text: string, start: number, hardEnd: number): number {
    const minEnd = start + Math.ceil(this.chunkSize / 2);

    for (const separator of SEPARATORS) {
      const index = text.lastIndexOf(separator, hardEnd - separator.length);
      if (index >= 0 && index + separator.length >= minEnd) {
        return index + separator.length;
      }
    }

    return hardEnd;
  }

  private unitSpans(units: TextUnit[]): UnitSpan[] {
    const spans: UnitSpan[] = [];
    let offset = 0;
    for (const unit of units) {
      if (unit.text.length > 0) {
        spans.push({ start: offset, end: offset + unit.text.length, page: unit.page });
      }
      offset += unit.text.length;
    }
    return spans;
  }

  private pageAt(spans: UnitSpan[], offset: number): number | null {
    const span = spans.find(candidate => offset >= candidate.start && offset < candidate.end);
    return span ? span.page : null;
  }

  /**
   * Get chunk statistics
   */
  static getChunkStats(chunks: DocumentChunk[]): {
    totalChunks: number;
    averageChunkSize: number;
    minChunkSize: number;
    maxChunkSize: number;
  } {
    if (chunks.length === 0) {
      return {
        totalChunks: 0,
        averageChunkSize: 0,
        minChunkSize: 0,
        maxChunkSize: 0
      };
    }

    const sizes = chunks.map(chunk => chunk.content.length);
    const totalSize = sizes.reduce((sum, size) => sum + size, 0);

    return {
      totalChunks: chunks.length,
      averageChunkSize: Math.round(totalSize / chunks.length),
      minChunkSize: Math.min(...sizes),
      maxChunkSize: Math.max(...sizes)
    };
  }
}
