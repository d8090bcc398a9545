import * as path from 'path';
import { logger } from '../../utils/logger';
import { FileType, TextUnit } from '../../types';
import { LoadError, RagError, errorMessage } from '../../types/api';
import { DocumentLoader } from './types';
import { PdfLoader } from './pdf-loader';
import { CsvLoader, HtmlLoader, TextLoader } from './text-loaders';
import { DocxLoader } from './docx-loader';

export type { DocumentLoader } from './types';
export { PAGE_SEPARATOR } from './types';
export { PdfLoader } from './pdf-loader';
export { CsvLoader, HtmlLoader, TextLoader } from './text-loaders';
export { DocxLoader } from './docx-loader';

const FILE_TYPE_ALIASES = new Map<string, FileType>([
  ['pdf', 'pdf'],
  ['application/pdf', 'pdf'],
  ['txt', 'txt'],
  ['text', 'txt'],
  ['text/plain', 'txt'],
  ['md', 'md'],
  ['markdown', 'md'],
  ['text/markdown', 'md'],
  ['html', 'html'],
  ['htm', 'html'],
  ['text/html', 'html'],
  ['csv', 'csv'],
  ['text/csv', 'csv'],
  ['docx', 'docx'],
  ['application/vnd.openxmlformats-officedocument.wordprocessingml.document', 'docx']
]);

/**
 * Resolve a declared type (extension, ".ext" or MIME type), falling back to the
 * filename extension. Returns undefined for anything unsupported.
 */
export function detectFileType(filename: string, declared?: string): FileType | undefined {
  const candidates = [declared, path.extname(filename)];
  for (const candidate of candidates) {
    const key = candidate?.trim().toLowerCase().replace(/^\./, '');
    const fileType = key ? FILE_TYPE_ALIASES.get(key) : undefined;
    if (fileType) {
      return fileType;
    }
  }
  return undefined;
}

export interface LoadedDocument {
  fileType: FileType;
  units: TextUnit[];
}

export class LoaderRegistry {
  private loaders = new Map<FileType, DocumentLoader>();

  constructor(loaders: DocumentLoader[] = [new PdfLoader(), new TextLoader(), new HtmlLoader(), new CsvLoader(), new DocxLoader()]) {
    loaders.forEach(loader => this.register(loader));
  }

  register(loader: DocumentLoader): void {
    for (const fileType of loader.fileTypes) {
      this.loaders.set(fileType, loader);
    }
  }

  supportedTypes(): FileType[] {
    return Array.from(this.loaders.keys());
  }

  /**
   * Extract text units from a file. Every failure surfaces as a LoadError,
   * including documents that yield no text at all.
   */
  async load(filename: string, content: Buffer, declaredType?: string): Promise<LoadedDocument> {
    const fileType = detectFileType(filename, declaredType);
    const loader = fileType ? this.loaders.get(fileType) : undefined;

    if (!fileType || !loader) {
      throw new LoadError(filename, `unsupported file type "${declaredType || path.extname(filename) || 'unknown'}"`);
    }

    const startTime = Date.now();
    let units: TextUnit[];
    try {
      units = await loader.extract(content, filename);
    } catch (error) {
      if (error instanceof RagError) {
        throw error;
      }
      throw new LoadError(filename, errorMessage(error), error);
    }

    if (!units.some(unit => unit.text.trim())) {
      throw new LoadError(filename, 'no text could be extracted');
    }

    logger.performance('Document load', Date.now() - startTime, {
      file: filename,
      fileType,
      units: units.length
    });

    return { fileType, units };
  }
}
