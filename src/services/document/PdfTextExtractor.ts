import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import type { DocumentSource, ExtractedDocument } from './DocumentSource.interface.js';

/** Plain text of every page, concatenated in page order. No OCR. */
export class PdfTextExtractor implements DocumentSource {
  async extractText(content: Buffer): Promise<ExtractedDocument> {
    try {
      const data = await pdfParse(content);

      logger.debug({ size: content.length, pageCount: data.numpages, textLength: data.text.length }, 'Processed PDF');

      return {
        text: data.text,
        pageCount: data.numpages,
      };
    } catch (error) {
      logger.error({ error, size: content.length }, 'PDF processing failed');
      throw new ValidationError('Failed to parse PDF file', error instanceof Error ? error.message : error);
    }
  }
}
