export type CapabilityName = 'embedding' | 'completion';

export type AnalysisKind =
  | 'citations'
  | 'methodology'
  | 'search'
  | 'concept-map'
  | 'gaps'
  | 'glossary'
  | 'summary'
  | 'flashcards'
  | 'comparison';

export interface ExtractionAttempt {
  backend: string;
  status: 'failed' | 'insufficient' | 'accepted';
  textLength: number;
  error?: string;
}

export class PaperLensError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'PaperLensError';
  }
}

export class ExtractionInsufficientError extends PaperLensError {
  constructor(
    public readonly minTextLength: number,
    public readonly attempts: ExtractionAttempt[]
  ) {
    super(`No extraction backend produced at least ${minTextLength} characters of text.`, {
      minTextLength,
      attempts
    });
    this.name = 'ExtractionInsufficientError';
  }
}

export class CapabilityUnavailableError extends PaperLensError {
  constructor(
    message: string,
    public readonly capability: CapabilityName,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'CapabilityUnavailableError';
  }
}

export class AnalysisError extends PaperLensError {
  constructor(
    message: string,
    public readonly kind: AnalysisKind,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'AnalysisError';
  }
}

export class HttpRequestError extends PaperLensError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.name = 'HttpRequestError';
  }
}

export class SourceAccessError extends PaperLensError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'SourceAccessError';
  }
}
