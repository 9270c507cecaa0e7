import { SourceAccessError } from '../../core/errors.js';
import { documentFileName, isPdfBytes, readDocumentBytes } from '../document-source.js';
import type { BackendOutput, DocumentHandle, ExtractionBackend } from '../types.js';

export class PlainTextBackend implements ExtractionBackend {
  readonly name = 'plain-text';

  async extract(handle: DocumentHandle): Promise<BackendOutput> {
    const bytes = await readDocumentBytes(handle);
    if (isPdfBytes(bytes)) {
      throw new SourceAccessError(`${documentFileName(handle)} is a PDF; plain-text decoding skipped.`);
    }

    try {
      return { text: new TextDecoder('utf-8', { fatal: true }).decode(bytes) };
    } catch (error) {
      throw new SourceAccessError(`${documentFileName(handle)} is not valid UTF-8 text.`, {
        cause: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
