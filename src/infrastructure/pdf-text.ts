import { createRequire } from 'node:module';
import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocumentProxy, TextItem } from 'pdfjs-dist/types/src/display/api.js';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import type { RecognizedText, TextRecognizer } from '../services/recognition/types.js';
import { logger } from './logger.js';

const require = createRequire(import.meta.url);
const STANDARD_FONT_DATA_URL = join(
  require.resolve('pdfjs-dist/package.json'),
  '../standard_fonts/',
);

const MAX_PDF_SIZE_BYTES = 20 * 1024 * 1024; // 20MB
const PAGE_SEPARATOR = '\n\n--- Page Break ---\n\n';

/**
 * Reads the embedded text layer of a PDF. Scanned receipts without a text layer
 * come back as RECOGNITION_EMPTY; an OCR engine plugs in behind the same interface.
 */
export class PdfTextRecognizer implements TextRecognizer {
  readonly method = 'pdfjs-text-layer';

  async recognize(path: string): Promise<Result<RecognizedText, AppError>> {
    const log = logger.child({ module: 'pdf-text', path });

    let buffer: Buffer;
    try {
      const info = await stat(path);
      if (info.size > MAX_PDF_SIZE_BYTES) {
        log.error(
          { errorCode: ErrorCode.FILE_TOO_LARGE, retryable: false, sizeBytes: info.size },
          'PDF exceeds size limit',
        );
        return err(
          createAppError(
            ErrorCode.FILE_TOO_LARGE,
            `PDF size ${info.size} bytes exceeds ${MAX_PDF_SIZE_BYTES} byte limit`,
            false,
          ),
        );
      }
      buffer = await readFile(path);
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.error({ errorCode: ErrorCode.FILE_NOT_FOUND, retryable: false, details }, 'Cannot read document');
      return err(createAppError(ErrorCode.FILE_NOT_FOUND, 'Document file cannot be read', false, details));
    }

    let pdf: PDFDocumentProxy;
    try {
      pdf = await getDocument({
        data: new Uint8Array(buffer),
        standardFontDataUrl: STANDARD_FONT_DATA_URL,
      }).promise;
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.error({ errorCode: ErrorCode.RECOGNITION_FAILED, retryable: false, details }, 'Failed to parse PDF');
      return err(
        createAppError(ErrorCode.RECOGNITION_FAILED, 'Failed to parse PDF document', false, details),
      );
    }

    const pageCount = pdf.numPages;
    const pages: string[] = [];
    try {
      for (let i = 1; i <= pageCount; i++) {
        const page = await pdf.getPage(i);
        const content = await page.getTextContent();
        const lines: string[] = [];
        let current = '';
        for (const item of content.items) {
          if (!('str' in item)) continue;
          const textItem: TextItem = item;
          current += textItem.str;
          if (textItem.hasEOL) {
            lines.push(current);
            current = '';
          } else {
            current += ' ';
          }
        }
        lines.push(current);
        pages.push(lines.map((line) => line.trimEnd()).join('\n').trim());
      }
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.error({ errorCode: ErrorCode.RECOGNITION_FAILED, retryable: false, details }, 'Failed to extract text from PDF');
      return err(
        createAppError(ErrorCode.RECOGNITION_FAILED, 'Failed to extract text from PDF', false, details),
      );
    } finally {
      await pdf.destroy();
    }

    const text = pages.filter((page) => page.length > 0).join(PAGE_SEPARATOR);

    if (text.length === 0) {
      log.error({ errorCode: ErrorCode.RECOGNITION_EMPTY, retryable: false, pageCount }, 'PDF contains no text');
      return err(
        createAppError(ErrorCode.RECOGNITION_EMPTY, 'PDF contains no recognizable text', false),
      );
    }

    log.info({ pageCount, textLength: text.length }, 'PDF text extracted');
    return ok({ text, pageCount, method: this.method });
  }
}
