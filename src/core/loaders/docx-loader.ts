import * as mammoth from 'mammoth';
import { logger } from '../../utils/logger';
import { FileType, TextUnit } from '../../types';
import { DocumentLoader } from './types';

export class DocxLoader implements DocumentLoader {
  readonly fileTypes: readonly FileType[] = ['docx'];

  async extract(content: Buffer, filename: string): Promise<TextUnit[]> {
    const result = await mammoth.extractRawText({ buffer: content });

    for (const message of result.messages) {
      logger.debug(`DOCX conversion note for ${filename}: ${message.message}`);
    }

    return [{ text: result.value, page: null }];
  }
}
