import { describe, it, expect } from 'vitest';
import { TextChunker } from '../src/core/chunker';
import { ValidationError } from '../src/types/api';

const paragraph = (topic: string, sentences: number) =>
  Array.from({ length: sentences }, (_, i) => `The ${topic} note number ${i} says something useful.`).join(' ');

describe('TextChunker', () => {
  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => new TextChunker({ chunkSize: 100, chunkOverlap: 100 })).toThrow(ValidationError);
    expect(() => new TextChunker({ chunkSize: 100, chunkOverlap: 150 })).toThrow('Overlap size must be less than chunk size');
  });

  it('rejects non-positive or fractional chunk sizes', () => {
    expect(() => new TextChunker({ chunkSize: 0, chunkOverlap: 0 })).toThrow(ValidationError);
    expect(() => new TextChunker({ chunkSize: 10.5, chunkOverlap: 2 })).toThrow(ValidationError);
    expect(() => new TextChunker({ chunkSize: 10, chunkOverlap: -1 })).toThrow(ValidationError);
  });

  it('produces exactly one chunk for a document shorter than the chunk size', () => {
    const chunker = new TextChunker({ chunkSize: 1500, chunkOverlap: 200 });

    expect(chunker.chunkText('short text')).toEqual([
      { chunkIndex: 0, content: 'short text', page: null, start: 0, end: 10 }
    ]);
  });

  it('produces no chunks for empty text', () => {
    const chunker = new TextChunker({ chunkSize: 100, chunkOverlap: 10 });
    expect(chunker.chunkText('')).toEqual([]);
  });

  it('starts each chunk overlap characters before the previous cut', () => {
    const chunker = new TextChunker({ chunkSize: 1500, chunkOverlap: 200 });
    const chunks = chunker.chunkText('alpha '.repeat(500));

    expect(chunks[0]).toMatchObject({ start: 0, end: 1500 });
    expect(chunks[1].start).toBe(1300);
    expect(chunks.map(chunk => chunk.chunkIndex)).toEqual(chunks.map((_, i) => i));
  });

  it('prefers paragraph breaks over word breaks when cutting', () => {
    const chunker = new TextChunker({ chunkSize: 100, chunkOverlap: 10 });
    const text = `${'a'.repeat(70)}\n\n${'b '.repeat(40)}`;
    const [first] = chunker.chunkText(text);

    expect(first.end).toBe(72);
    expect(first.content).toBe(`${'a'.repeat(70)}\n\n`);
  });

  it('hard-cuts text without any break', () => {
    const chunker = new TextChunker({ chunkSize: 40, chunkOverlap: 10 });
    const chunks = chunker.chunkText('x'.repeat(100));

    expect(chunks.map(chunk => [chunk.start, chunk.end])).toEqual([
      [0, 40],
      [30, 70],
      [60, 100]
    ]);
  });

  it('reconstructs the original text once overlaps are trimmed', () => {
    const texts = [
      paragraph('alpha', 80),
      `${paragraph('first', 20)}\n\n${paragraph('second', 30)}\n${paragraph('third', 10)}`,
      'y'.repeat(997),
      'word '.repeat(301)
    ];
    const configs = [
      { chunkSize: 100, chunkOverlap: 0 },
      { chunkSize: 120, chunkOverlap: 30 },
      { chunkSize: 500, chunkOverlap: 499 },
      { chunkSize: 1500, chunkOverlap: 200 }
    ];

    for (const text of texts) {
      for (const options of configs) {
        const chunks = new TextChunker(options).chunkText(text);
        expect(TextChunker.reconstruct(chunks)).toBe(text);
        for (const chunk of chunks) {
          expect(chunk.content.length).toBeLessThanOrEqual(options.chunkSize);
          expect(text.slice(chunk.start, chunk.end)).toBe(chunk.content);
        }
      }
    }
  });

  it('is deterministic for the same input and configuration', () => {
    const chunker = new TextChunker({ chunkSize: 120, chunkOverlap: 30 });
    const text = paragraph('determinism', 40);

    expect(chunker.chunkText(text)).toEqual(chunker.chunkText(text));
    expect(new TextChunker({ chunkSize: 120, chunkOverlap: 30 }).chunkText(text)).toEqual(chunker.chunkText(text));
  });

  it('gives each chunk the page of its first character', () => {
    const chunker = new TextChunker({ chunkSize: 40, chunkOverlap: 10 });
    const chunks = chunker.chunkUnits([
      { text: `${'a'.repeat(50)} `, page: 0 },
      { text: 'b'.repeat(50), page: 1 }
    ]);

    expect(chunks.map(chunk => [chunk.start, chunk.end, chunk.page])).toEqual([
      [0, 40, 0],
      [30, 51, 0],
      [41, 81, 0],
      [71, 101, 1]
    ]);
    // The third chunk spans both pages and keeps the earlier one
    expect(chunks[2].content).toBe(`${'a'.repeat(9)} ${'b'.repeat(30)}`);
  });

  it('skips empty units when attributing pages', () => {
    const chunker = new TextChunker({ chunkSize: 100, chunkOverlap: 10 });
    const chunks = chunker.chunkUnits([
      { text: '', page: 0 },
      { text: 'content on the second page', page: 1 }
    ]);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].page).toBe(1);
  });

  it('reports chunk statistics', () => {
    const chunks = new TextChunker({ chunkSize: 40, chunkOverlap: 10 }).chunkText('x'.repeat(100));

    expect(TextChunker.getChunkStats(chunks)).toEqual({
      totalChunks: 3,
      averageChunkSize: 40,
      minChunkSize: 40,
      maxChunkSize: 40
    });
    expect(TextChunker.getChunkStats([]).totalChunks).toBe(0);
  });
});
