import { FileType, TextUnit } from '../../types';

// Appended between pages/rows so adjacent units don't run together
export const PAGE_SEPARATOR = '\n\n';

/**
 * One document format. Adding a format means adding an implementation
 * and registering it; callers only ever see TextUnit[].
 */
export interface DocumentLoader {
  readonly fileTypes: readonly FileType[];
  extract(content: Buffer, filename: string): Promise<TextUnit[]>;
}
