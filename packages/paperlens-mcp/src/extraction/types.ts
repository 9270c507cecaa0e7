import type { ExtractionAttempt } from '../core/errors.js';

export type DocumentHandle =
  | { kind: 'file'; path: string }
  | { kind: 'buffer'; data: Uint8Array; fileName: string };

/** Document information embedded in the file itself, as opposed to guessed from its text. */
export interface DocumentMetadata {
  title: string | null;
  author: string | null;
  pageCount: number | null;
}

export interface BackendOutput {
  text: string;
  metadata?: DocumentMetadata;
}

export interface ExtractionBackend {
  readonly name: string;
  /** Raw text or a thrown error; the extractor decides whether the text is good enough. */
  extract(handle: DocumentHandle): Promise<BackendOutput>;
}

export interface ExtractedDocument {
  text: string;
  title: string | null;
  metadata: DocumentMetadata | null;
  backend: string;
  attempts: ExtractionAttempt[];
}
