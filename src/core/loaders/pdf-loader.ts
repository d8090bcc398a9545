import { getDocument } from 'pdfjs-dist/legacy/build/pdf';
import { logger } from '../../utils/logger';
import { FileType, TextUnit } from '../../types';
import { DocumentLoader, PAGE_SEPARATOR } from './types';

export class PdfLoader implements DocumentLoader {
  readonly fileTypes: readonly FileType[] = ['pdf'];

  /**
   * Validate PDF content by checking magic bytes (more reliable than the extension)
   */
  static isPdf(content: Buffer): boolean {
    // PDF files start with %PDF-
    return content.subarray(0, 4).toString('ascii') === '%PDF';
  }

  async extract(content: Buffer, filename: string): Promise<TextUnit[]> {
    if (!PdfLoader.isPdf(content)) {
      throw new Error('not a PDF file (magic bytes check failed)');
    }

    const startTime = Date.now();
    const pdf = await getDocument({
      data: new Uint8Array(content),
      useSystemFonts: true,
      isEvalSupported: false
    }).promise;

    try {
      logger.debug(`PDF loaded: ${filename}, ${pdf.numPages} pages`);

      const pages: string[] = [];
      for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();

        const pageText = textContent.items
          .map(item => ('str' in item ? item.str : ''))
          .join(' ')
          .replace(/\s+/g, ' ') // Normalize whitespace
          .trim();

        pages.push(pageText);
      }

      // Empty pages keep their slot so later pages keep their numbers
      const units = pages.map((text, index) => ({
        text: index < pages.length - 1 ? text + PAGE_SEPARATOR : text,
        page: index
      }));

      logger.performance('PDF extraction', Date.now() - startTime, {
        file: filename,
        pages: pdf.numPages
      });

      return units;
    } finally {
      await pdf.destroy();
    }
  }
}
