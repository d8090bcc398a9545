import { FileType, TextUnit } from '../../types';
import { DocumentLoader, PAGE_SEPARATOR } from './types';

export function decodeUtf8(content: Buffer): string {
  const text = content.toString('utf-8');
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Plain text and Markdown are indexed as-is, as a single page-less unit.
 */
export class TextLoader implements DocumentLoader {
  readonly fileTypes: readonly FileType[] = ['txt', 'md'];

  async extract(content: Buffer): Promise<TextUnit[]> {
    return [{ text: decodeUtf8(content), page: null }];
  }
}

const HTML_ENTITIES = new Map<string, string>([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
  ['nbsp', ' ']
]);

// Out-of-range and NUL references decode to the replacement character, as browsers do
function fromCodePoint(codePoint: number): string {
  if (!Number.isSafeInteger(codePoint) || codePoint <= 0 || codePoint > 0x10ffff) {
    return '\uFFFD';
  }
  return String.fromCodePoint(codePoint);
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return fromCodePoint(parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith('#')) {
      return fromCodePoint(parseInt(entity.slice(1), 10));
    }
    return HTML_ENTITIES.get(entity.toLowerCase()) ?? match;
  });
}

export function htmlToText(html: string): string {
  return decodeEntities(
    html
      .replace(/<(script|style|noscript|template)\b[^>]*>[\s\S]*?<\/\1>/gi, '')
      .replace(/<!--[\s\S]*?-->/g, '')
      .replace(/<br\s*\/?>/gi, '\n')
      .replace(/<\/(p|div|li|h[1-6]|tr|section|article|header|footer|blockquote|pre)>/gi, '\n')
      .replace(/<[^>]+>/g, ' ')
  )
    .replace(/[ \t\f\v]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export class HtmlLoader implements DocumentLoader {
  readonly fileTypes: readonly FileType[] = ['html'];

  async extract(content: Buffer): Promise<TextUnit[]> {
    return [{ text: htmlToText(decodeUtf8(content)), page: null }];
  }
}

/**
 * Split CSV text into rows of fields, honouring quoted fields that contain
 * commas, doubled quotes or line breaks.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter(cells => cells.some(cell => cell.trim() !== ''));
}

/**
 * One unit per data row, rendered as "header: value" lines.
 */
export class CsvLoader implements DocumentLoader {
  readonly fileTypes: readonly FileType[] = ['csv'];

  async extract(content: Buffer): Promise<TextUnit[]> {
    const [header, ...rows] = parseCsv(decodeUtf8(content));
    if (!header) {
      return [];
    }

    const columns = header.map((name, index) => name.trim() || `column_${index + 1}`);

    return rows.map((cells, rowIndex) => {
      const lines = columns.map((column, index) => `${column}: ${(cells[index] ?? '').trim()}`);
      const text = lines.join('\n');
      return {
        text: rowIndex < rows.length - 1 ? text + PAGE_SEPARATOR : text,
        page: null
      };
    });
  }
}
