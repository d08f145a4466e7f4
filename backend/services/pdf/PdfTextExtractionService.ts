/**
 * PdfTextExtractionService
 * Reads the text layer of a PDF page by page, marking underlined spans, and
 * tags each page with a "[PAGE n]" marker for the segmenter.
 */

import { getDocument, OPS } from 'pdfjs-dist';
import type { PDFDocumentProxy, PDFPageProxy, TextItem } from 'pdfjs-dist/types/src/display/api';
import type { ExtractedText, PageText, TextSpan } from '../../types/index.js';
import { DocumentError, EmptyInputError, SizeLimitError, UnextractableContentError } from '../../utils/errorHandler.js';
import { createLogger } from '../../utils/LoggerUtils.js';
import { collectUnderlineSegments, findUnderlinedSpans, PathOps, wrapUnderlined } from './UnderlineDetector.js';

const logger = createLogger('PDF TEXT');

export interface TextExtractionOptions {
  maxPages: number;
  nearEmptyPageChars: number;
  scannedPageRatio: number;
}

const PATH_OPS: PathOps = {
  save: OPS.save,
  restore: OPS.restore,
  transform: OPS.transform,
  constructPath: OPS.constructPath,
  moveTo: OPS.moveTo,
  lineTo: OPS.lineTo,
  curveTo: OPS.curveTo,
  curveTo2: OPS.curveTo2,
  curveTo3: OPS.curveTo3,
  closePath: OPS.closePath,
  rectangle: OPS.rectangle
};

export const countNonWhitespace = (text: string): number => text.replace(/\s/g, '').length;

function isTextItem(item: unknown): item is TextItem {
  return typeof item === 'object' && item !== null && 'str' in item && 'transform' in item;
}

function toSpan(item: TextItem): TextSpan {
  const transform: unknown[] = item.transform;
  const num = (value: unknown) => (typeof value === 'number' ? value : 0);
  return {
    text: item.str,
    x: num(transform[4]),
    y: num(transform[5]),
    width: item.width,
    height: item.height || Math.hypot(num(transform[2]), num(transform[3]))
  };
}

export async function openPdf(pdfBuffer: Buffer | Uint8Array): Promise<PDFDocumentProxy> {
  if (pdfBuffer.length === 0) {
    throw new EmptyInputError();
  }
  try {
    // pdfjs takes ownership of the array it is given
    return await getDocument({
      data: new Uint8Array(pdfBuffer),
      isEvalSupported: false,
      useSystemFonts: false,
      disableFontFace: true,
      verbosity: 0
    }).promise;
  } catch (error) {
    logger.error('Failed to open PDF', error);
    throw new DocumentError(`PDF could not be opened: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
}

export class PdfTextExtractionService {
  /**
   * Text of one page with underlined spans wrapped in markers.
   * Underline detection is best effort; a failure there leaves the text unmarked.
   */
  static async extractPageText(page: PDFPageProxy): Promise<PageText> {
    const content = await page.getTextContent();
    const items = content.items.filter(isTextItem);
    const spans = items.map(toSpan);

    let underlined: boolean[] = spans.map(() => false);
    try {
      const operatorList = await page.getOperatorList();
      const segments = collectUnderlineSegments(operatorList, PATH_OPS);
      if (segments.length > 0) {
        underlined = findUnderlinedSpans(spans, segments);
      }
    } catch (error) {
      logger.warn(`Page ${page.pageNumber}: underline detection skipped`, error instanceof Error ? error.message : String(error));
    }

    let text = '';
    items.forEach((item, index) => {
      text += underlined[index] ? wrapUnderlined(item.str) : item.str;
      if (item.hasEOL) {
        text += '\n';
      }
    });

    return {
      pageNumber: page.pageNumber,
      text: text.trim(),
      underlinedSpans: underlined.filter(Boolean).length
    };
  }

  /**
   * Extract all pages. Fails on unreadable or oversized documents before reading any page.
   */
  static async extract(pdfBuffer: Buffer | Uint8Array, options: TextExtractionOptions): Promise<ExtractedText> {
    const doc = await openPdf(pdfBuffer);

    try {
      if (doc.numPages > options.maxPages) {
        throw new SizeLimitError(doc.numPages, options.maxPages);
      }

      const pages: PageText[] = [];
      for (let i = 1; i <= doc.numPages; i++) {
        const page = await doc.getPage(i);
        try {
          pages.push(await this.extractPageText(page));
        } finally {
          page.cleanup();
        }
      }

      const nearEmpty = pages.filter(page => countNonWhitespace(page.text) < options.nearEmptyPageChars).length;
      const likelyScanned = pages.length > 0 && nearEmpty / pages.length > options.scannedPageRatio;
      if (likelyScanned) {
        logger.warn(`${nearEmpty}/${pages.length} pages have almost no text; document is probably scanned`);
      }

      const taggedText = pages.map(page => `[PAGE ${page.pageNumber}]\n${page.text}\n`).join('\n');
      const nonWhitespaceChars = pages.reduce((sum, page) => sum + countNonWhitespace(page.text), 0);
      const underlinedTotal = pages.reduce((sum, page) => sum + page.underlinedSpans, 0);

      logger.info(`Extracted ${doc.numPages} pages, ${nonWhitespaceChars} chars, ${underlinedTotal} underlined spans`);

      return { pages, taggedText, pageCount: doc.numPages, nonWhitespaceChars, likelyScanned };
    } finally {
      await doc.destroy();
    }
  }

  /**
   * Throws when the document carries too little text to work from.
   */
  static requireText(extracted: ExtractedText, minTextChars: number): void {
    if (extracted.nonWhitespaceChars < minTextChars) {
      throw new UnextractableContentError(
        `PDF contains only ${extracted.nonWhitespaceChars} characters of text; it appears to be scanned images. ` +
        'Provide a PDF with a text layer or use vision mode.'
      );
    }
  }
}
