import { PDFParse } from 'pdf-parse';
import { z } from 'zod';
import { SourceAccessError } from '../../core/errors.js';
import { documentFileName, isPdfBytes, readDocumentBytes } from '../document-source.js';
import type { BackendOutput, DocumentHandle, DocumentMetadata, ExtractionBackend } from '../types.js';

// The PDF info dictionary is free-form; only the fields we surface are checked.
const pdfInfoSchema = z
  .object({
    Title: z.string().optional(),
    Author: z.string().optional()
  })
  .passthrough();

const presentOrNull = (value: string | undefined): string | null => {
  const trimmed = value?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
};

export const toDocumentMetadata = (info: unknown, pageCount: unknown): DocumentMetadata => {
  const parsed = pdfInfoSchema.safeParse(info);
  const fields = parsed.success ? parsed.data : undefined;

  return {
    title: presentOrNull(fields?.Title),
    author: presentOrNull(fields?.Author),
    pageCount: typeof pageCount === 'number' && Number.isInteger(pageCount) && pageCount > 0 ? pageCount : null
  };
};

/** Local text-layer extraction; no OCR, so scanned PDFs come back (nearly) empty. */
export class PdfParseBackend implements ExtractionBackend {
  readonly name = 'pdf-parse';

  async extract(handle: DocumentHandle): Promise<BackendOutput> {
    const bytes = await readDocumentBytes(handle);
    if (!isPdfBytes(bytes)) {
      throw new SourceAccessError(`${documentFileName(handle)} is not a PDF document.`);
    }

    const parser = new PDFParse({ data: Buffer.from(bytes) });
    try {
      const info = await parser.getInfo();
      const parsed = await parser.getText();
      return {
        text: parsed.text ?? '',
        metadata: toDocumentMetadata(info.info, info.total)
      };
    } finally {
      await parser.destroy();
    }
  }
}
