/**
 * PdfProcessingService
 * Renders PDF pages into base64 page images for vision-mode extraction.
 */

import { fromBuffer } from 'pdf2pic';
import sharp from 'sharp';
import { PDFDocument } from 'pdf-lib';
import { v4 as uuidv4 } from 'uuid';
import path from 'path';
import fs from 'fs/promises';
import os from 'os';
import type { PageImage } from '../../types/index.js';
import { DocumentError, EmptyInputError, SizeLimitError } from '../../utils/errorHandler.js';
import { createLogger } from '../../utils/LoggerUtils.js';

const logger = createLogger('PDF PROCESSING');

export interface RenderOptions {
  dpi: number;
  maxPages: number;
}

/**
 * Anything that can turn PDF bytes into page images.
 */
export interface PageRenderer {
  renderPages(pdfBuffer: Buffer, options: RenderOptions): Promise<PageImage[]>;
}

export class PdfProcessingService implements PageRenderer {

  /**
   * Page count and first-page size in points, read without rendering.
   */
  static async inspect(pdfBuffer: Buffer): Promise<{ pageCount: number; widthPt: number; heightPt: number }> {
    try {
      const pdfDoc = await PDFDocument.load(pdfBuffer, { ignoreEncryption: true });
      const pageCount = pdfDoc.getPageCount();
      if (pageCount === 0) {
        return { pageCount, widthPt: 0, heightPt: 0 };
      }
      const { width, height } = pdfDoc.getPage(0).getSize();
      return { pageCount, widthPt: width, heightPt: height };
    } catch (pdfErr) {
      logger.error('Failed to read PDF with pdf-lib', pdfErr);
      throw new DocumentError(`PDF could not be opened: ${pdfErr instanceof Error ? pdfErr.message : 'Unknown error'}`);
    }
  }

  /**
   * Converts a PDF buffer into one PNG per page at the requested DPI.
   */
  async renderPages(pdfBuffer: Buffer, options: RenderOptions): Promise<PageImage[]> {
    if (pdfBuffer.length === 0) {
      throw new EmptyInputError();
    }

    const { pageCount, widthPt, heightPt } = await PdfProcessingService.inspect(pdfBuffer);
    if (pageCount > options.maxPages) {
      throw new SizeLimitError(pageCount, options.maxPages);
    }
    if (pageCount === 0) {
      return [];
    }

    const startTime = Date.now();

    // Create a unique temporary directory for this conversion
    let tempDirPath: string;
    try {
      tempDirPath = await fs.mkdtemp(path.join(os.tmpdir(), 'pdf2pic-'));
    } catch (dirError) {
      logger.error('Failed to create temporary directory', dirError);
      throw new Error('Failed to create temporary directory for PDF conversion.');
    }

    const convert = fromBuffer(pdfBuffer, {
      density: options.dpi,
      format: 'png',
      quality: 100,
      savePath: tempDirPath,
      saveFilename: `page_${uuidv4()}`,
      width: widthPt ? Math.round((widthPt / 72) * options.dpi) : undefined,
      height: heightPt ? Math.round((heightPt / 72) * options.dpi) : undefined,
      preserveAspectRatio: true
    });

    try {
      // Convert all pages; returns array of file outputs with paths
      const conversionResults = await convert.bulk(-1);

      // Ensure ordered by page number
      const ordered = [...conversionResults].sort((a, b) => (a.page || 0) - (b.page || 0));

      const pages: PageImage[] = [];
      for (let i = 0; i < ordered.length; i++) {
        const result = ordered[i];
        const pageNumber = result.page || i + 1;
        if (!result.path) {
          logger.warn(`Conversion result for page ${pageNumber} is missing the file path.`);
          continue;
        }

        try {
          const imageFileBuffer = await fs.readFile(result.path);
          // Get reliable dimensions via sharp
          const meta = await sharp(imageFileBuffer).metadata();
          if (!meta.width || !meta.height) {
            logger.warn(`Sharp failed to get valid dimensions for page ${pageNumber}. Skipping page.`);
            continue;
          }
          pages.push({
            pageNumber,
            base64: imageFileBuffer.toString('base64'),
            mimeType: 'image/png',
            width: meta.width,
            height: meta.height
          });
        } catch (readFileError) {
          logger.error(`Failed to read or measure image for page ${pageNumber}`, readFileError);
        }
      }

      const duration = (Date.now() - startTime) / 1000;
      logger.info(`Rendered ${pages.length}/${pageCount} pages at ${options.dpi} DPI in ${duration.toFixed(1)}s`);
      return pages;

    } catch (error) {
      logger.error('PDF conversion failed', error);
      throw new DocumentError(`PDF processing failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    } finally {
      try {
        await fs.rm(tempDirPath, { recursive: true, force: true });
      } catch (cleanupError) {
        logger.warn(`Failed to clean up temporary directory ${tempDirPath}`, cleanupError instanceof Error ? cleanupError.message : String(cleanupError));
      }
    }
  }
}

export default PdfProcessingService;
