/**
 * PdfExtractor - Extract text from PDF documents
 *
 * Pages are rendered one by one so their text can be joined with exactly one
 * newline per page boundary, in page order.
 */

import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { logger } from '../../utils/logger.js';
import { UnsupportedFormatError } from '../../types/errors.js';

/**
 * PDF extraction result
 */
export interface PdfExtractionResult {
  fullText: string;
  pageCount: number;
  diagnostics: {
    extractionMethod: 'pdf-parse';
    textLength: number;
    pagesWithText: number;
  };
}

/**
 * Rebuild a page's text from its positioned items. Items on the same baseline
 * are concatenated; a change of baseline starts a new line.
 */
async function renderPageText(pageData: pdfParse.PageData): Promise<string> {
  const content = await pageData.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });

  let lastY: number | undefined;
  let text = '';
  for (const item of content.items) {
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

/**
 * PdfExtractor - Extract text from PDF
 */
export class PdfExtractor {
  /**
   * Extract text from PDF buffer
   *
   * @throws UnsupportedFormatError if the PDF cannot be parsed (corrupted, encrypted,
   * not a PDF) or has no text layer (image-only scans)
   */
  async extract(pdfBuffer: Buffer): Promise<PdfExtractionResult> {
    // pdf-parse renders pages sequentially, so push order is page order
    const pageTexts: string[] = [];
    let pageCount: number;

    try {
      const data = await pdfParse(pdfBuffer, {
        max: 0, // 0 = no limit on pages
        pagerender: async (pageData) => {
          const text = await renderPageText(pageData);
          pageTexts.push(text);
          return text;
        },
      });
      pageCount = data.numpages;
    } catch (error) {
      logger.warn({ error, byteLength: pdfBuffer.length }, 'PDF parsing failed');
      throw new UnsupportedFormatError(
        `PDF could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
        { byteLength: pdfBuffer.length }
      );
    }

    const pages = pageTexts.map((text) => text.trim()).filter((text) => text.length > 0);
    if (pages.length === 0) {
      throw new UnsupportedFormatError(
        'PDF has no extractable text (it may contain only images)',
        { pageCount }
      );
    }

    const fullText = pages.join('\n');

    logger.debug(
      {
        pageCount,
        pagesWithText: pages.length,
        textLength: fullText.length,
      },
      'PDF extraction completed'
    );

    return {
      fullText,
      pageCount,
      diagnostics: {
        extractionMethod: 'pdf-parse',
        textLength: fullText.length,
        pagesWithText: pages.length,
      },
    };
  }
}
