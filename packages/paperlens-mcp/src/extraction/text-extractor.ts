import type { AppConfig } from '../config.js';
import { ExtractionInsufficientError, type ExtractionAttempt } from '../core/errors.js';
import { HttpClient } from '../core/http-client.js';
import { describeError, type Logger } from '../core/logger.js';
import { GrobidBackend } from './backends/grobid-backend.js';
import { PdfParseBackend } from './backends/pdf-parse-backend.js';
import { PlainTextBackend } from './backends/plain-text-backend.js';
import { documentFileName } from './document-source.js';
import { normalizeText } from './text-normalizer.js';
import type { BackendOutput, DocumentHandle, ExtractedDocument, ExtractionBackend } from './types.js';

export const DEFAULT_MIN_TEXT_LENGTH = 100;

const MAX_TITLE_LENGTH = 200;

const guessTitle = (text: string): string | null => {
  const firstLine = text
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0);

  return firstLine && firstLine.length <= MAX_TITLE_LENGTH ? firstLine : null;
};

export interface TextExtractorOptions {
  minTextLength?: number;
}

/**
 * Tries backends in priority order and keeps the first output that clears the
 * minimum-length bar. Backend failures are recorded as attempts, never rethrown.
 */
export class TextExtractor {
  private readonly minTextLength: number;

  constructor(
    private readonly backends: ExtractionBackend[],
    private readonly logger: Logger,
    options: TextExtractorOptions = {}
  ) {
    this.minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
  }

  static fromConfig(config: AppConfig, logger: Logger): TextExtractor {
    const extractionLogger = logger.child({ component: 'text-extractor' });
    const backends: ExtractionBackend[] = [];

    if (config.extractionGrobidUrl) {
      const httpClient = new HttpClient(
        {
          timeoutMs: config.extractionTimeoutMs,
          retryAttempts: config.extractionRetryAttempts,
          retryDelayMs: config.extractionRetryDelayMs,
          userAgent: `${config.serverName}/${config.serverVersion}`
        },
        extractionLogger
      );
      backends.push(new GrobidBackend(config.extractionGrobidUrl, httpClient));
    }

    backends.push(new PdfParseBackend(), new PlainTextBackend());

    return new TextExtractor(backends, extractionLogger, {
      minTextLength: config.extractionMinTextLength
    });
  }

  get backendNames(): string[] {
    return this.backends.map((backend) => backend.name);
  }

  async extract(handle: DocumentHandle): Promise<ExtractedDocument> {
    const attempts: ExtractionAttempt[] = [];
    const source = documentFileName(handle);

    for (const backend of this.backends) {
      let output: BackendOutput;
      try {
        output = await backend.extract(handle);
      } catch (error) {
        attempts.push({ backend: backend.name, status: 'failed', textLength: 0, error: describeError(error) });
        this.logger.warn('Extraction backend failed, trying fallback', {
          backend: backend.name,
          source,
          error: describeError(error)
        });
        continue;
      }

      const textLength = output.text.trim().length;
      if (textLength < this.minTextLength) {
        attempts.push({ backend: backend.name, status: 'insufficient', textLength });
        this.logger.info('Extraction backend output below quality bar, trying fallback', {
          backend: backend.name,
          source,
          textLength,
          minTextLength: this.minTextLength
        });
        continue;
      }

      attempts.push({ backend: backend.name, status: 'accepted', textLength });
      const text = normalizeText(output.text);
      const metadata = output.metadata ?? null;
      this.logger.debug('Extracted document text', { backend: backend.name, source, textLength: text.length });

      return {
        text,
        title: metadata?.title ?? guessTitle(text),
        metadata,
        backend: backend.name,
        attempts
      };
    }

    throw new ExtractionInsufficientError(this.minTextLength, attempts);
  }
}
