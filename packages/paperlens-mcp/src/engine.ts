export { AnalysisFacade, createStrategies } from './analysis/analysis-facade.js';
export type { AnalysisFacadeOptions, AnalysisStrategies } from './analysis/analysis-facade.js';
export { DEFAULT_ASSISTED_OPTIONS } from './analysis/assisted.js';
export type { AssistedOptions } from './analysis/assisted.js';
export { DEFAULT_CHUNKER_OPTIONS, splitIntoChunks } from './analysis/chunker.js';
export type { ChunkerOptions } from './analysis/chunker.js';
export { CitationAnalyzer, UNKNOWN_AUTHOR } from './analysis/citation-analyzer.js';
export type { CitationAnalyzerOptions, CitationEdgeBuilder } from './analysis/citation-analyzer.js';
export { AssistedConceptGraphBuilder, HeuristicConceptGraphBuilder } from './analysis/concept-graph-builder.js';
export type { ConceptGraphStrategy } from './analysis/concept-graph-builder.js';
export {
  AssistedFlashcardGenerator,
  DEFAULT_FLASHCARD_COUNT,
  HeuristicFlashcardGenerator,
  MAX_FLASHCARD_COUNT
} from './analysis/flashcard-generator.js';
export type { FlashcardStrategy } from './analysis/flashcard-generator.js';
export { AssistedGapIdentifier, HeuristicGapIdentifier } from './analysis/gap-identifier.js';
export type { GapStrategy } from './analysis/gap-identifier.js';
export { AssistedGlossaryExtractor, HeuristicGlossaryExtractor, extractTechnicalTerms } from './analysis/glossary-extractor.js';
export type { GlossaryStrategy } from './analysis/glossary-extractor.js';
export { AssistedMethodologyClassifier, HeuristicMethodologyClassifier } from './analysis/methodology-classifier.js';
export type { MethodologyStrategy } from './analysis/methodology-classifier.js';
export { buildPatternLibrary, getPatternLibrary, loadPatternLibrary } from './analysis/patterns.js';
export type { PatternData, PatternLibrary } from './analysis/patterns.js';
export { DenseSearchStrategy, LexicalSearchStrategy, cosineSimilarity } from './analysis/similarity-ranker.js';
export type { SearchStrategy } from './analysis/similarity-ranker.js';
export { AssistedSummarizer, HeuristicSummarizer } from './analysis/summarizer.js';
export type { SummaryStrategy } from './analysis/summarizer.js';
export type * from './analysis/types.js';
export { invokeCapability, validateCompletion, validateEmbeddings } from './capabilities/invoke.js';
export { createCapabilities, OpenAiCompletionCapability, OpenAiEmbeddingCapability } from './capabilities/openai-capabilities.js';
export type { CapabilityCallOptions, CapabilitySet, CompletionCapability, EmbeddingCapability } from './capabilities/types.js';
export { parseConfig } from './config.js';
export type { AnalysisMode, AppConfig, ConfigOverrides, TransportMode } from './config.js';
export {
  AnalysisError,
  CapabilityUnavailableError,
  ExtractionInsufficientError,
  HttpRequestError,
  PaperLensError,
  SourceAccessError
} from './core/errors.js';
export type { AnalysisKind, CapabilityName, ExtractionAttempt } from './core/errors.js';
export { Logger } from './core/logger.js';
export type { LogLevel, LogSink } from './core/logger.js';
export { GrobidBackend, parseTeiDocument } from './extraction/backends/grobid-backend.js';
export { PdfParseBackend, toDocumentMetadata } from './extraction/backends/pdf-parse-backend.js';
export { PlainTextBackend } from './extraction/backends/plain-text-backend.js';
export { TextExtractor } from './extraction/text-extractor.js';
export { normalizeText } from './extraction/text-normalizer.js';
export type { BackendOutput, DocumentHandle, DocumentMetadata, ExtractedDocument, ExtractionBackend } from './extraction/types.js';
