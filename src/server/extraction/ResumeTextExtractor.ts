/**
 * ResumeTextExtractor - Turn an uploaded resume into trimmed plain text
 *
 * Dispatches on the document kind to the PDF or plain-text extractor.
 */

import path from 'path';
import { PdfExtractor } from './pdf/PdfExtractor.js';
import { TextExtractor } from './text/TextExtractor.js';
import { EmptyContentError, UnsupportedFormatError } from '../types/errors.js';
import type { DocumentKind } from '../types/resume.js';
import { logger } from '../utils/logger.js';

/**
 * Resolve the document kind from the declared media type, falling back to the
 * filename extension when the media type is generic or missing.
 *
 * @throws UnsupportedFormatError for anything other than PDF or text
 */
export function detectDocumentKind(mediaType: string | undefined, filename?: string): DocumentKind {
  const type = (mediaType || '').split(';')[0].trim().toLowerCase();
  const ext = filename ? path.extname(filename).toLowerCase() : '';

  if (type === 'application/pdf' || ext === '.pdf') {
    return 'pdf';
  }
  if (type.startsWith('text/') || ext === '.txt') {
    return 'text';
  }

  throw new UnsupportedFormatError(
    `Unsupported file type: ${type || 'unknown'}. Upload a PDF or a plain-text (.txt) file.`,
    { mediaType: type || undefined, filename }
  );
}

export class ResumeTextExtractor {
  constructor(
    private readonly pdfExtractor: PdfExtractor = new PdfExtractor(),
    private readonly textExtractor: TextExtractor = new TextExtractor()
  ) {}

  /**
   * @throws DecodeError, UnsupportedFormatError, EmptyContentError
   */
  async extract(buffer: Buffer, kind: DocumentKind): Promise<string> {
    const raw =
      kind === 'pdf'
        ? (await this.pdfExtractor.extract(buffer)).fullText
        : this.textExtractor.extract(buffer);

    const text = raw.trim();
    if (text.length === 0) {
      throw new EmptyContentError(
        kind === 'pdf' ? 'PDF contains no text' : 'Text file is empty',
        { kind, byteLength: buffer.length }
      );
    }

    logger.info({ kind, byteLength: buffer.length, textLength: text.length }, 'Resume text extracted');
    return text;
  }
}
