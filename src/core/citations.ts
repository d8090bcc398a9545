import { Citation, SearchResult } from '../types';

export const DEFAULT_SNIPPET_LENGTH = 240;

export function toSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const compact = content.replace(/\s+/g, ' ').trim();
  return compact.length > maxLength ? `${compact.slice(0, maxLength)}…` : compact;
}

/**
 * Group the chunks used for an answer into one citation per file.
 *
 * Files appear in the order they first occur in `results` (best-first), pages
 * are distinct and ascending, and the snippet comes from the file's
 * highest-scoring chunk.
 */
export function buildCitations(results: SearchResult[], snippetLength: number = DEFAULT_SNIPPET_LENGTH): Citation[] {
  const groups = new Map<string, { pages: Set<number>; best: SearchResult }>();

  for (const result of results) {
    const { filename, page } = result.chunk;
    let group = groups.get(filename);
    if (!group) {
      group = { pages: new Set(), best: result };
      groups.set(filename, group);
    } else if (result.score > group.best.score) {
      group.best = result;
    }
    if (page !== null) {
      group.pages.add(page);
    }
  }

  return Array.from(groups, ([source, group]) => ({
    source,
    pages: Array.from(group.pages).sort((a, b) => a - b),
    snippet: toSnippet(group.best.chunk.content, snippetLength),
    score: group.best.score
  }));
}
