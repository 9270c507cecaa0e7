import type { CapabilitySet } from '../capabilities/types.js';
import type { AppConfig } from '../config.js';
import { AnalysisError, type AnalysisKind } from '../core/errors.js';
import { describeError, Logger } from '../core/logger.js';
import { DEFAULT_ASSISTED_OPTIONS, type AssistedOptions } from './assisted.js';
import { DEFAULT_CHUNKER_OPTIONS, type ChunkerOptions } from './chunker.js';
import { CitationAnalyzer, type CitationAnalyzerOptions } from './citation-analyzer.js';
import {
  AssistedConceptGraphBuilder,
  HeuristicConceptGraphBuilder,
  type ConceptGraphStrategy
} from './concept-graph-builder.js';
import {
  emptyCitationReport,
  emptyComparisonReport,
  emptyConceptGraph,
  emptyFlashcardReport,
  emptyGapReport,
  emptyGlossaryReport,
  emptyMethodologyReport,
  emptySearchReport,
  emptySummaryReport
} from './defaults.js';
import {
  AssistedFlashcardGenerator,
  DEFAULT_FLASHCARD_COUNT,
  HeuristicFlashcardGenerator,
  MAX_FLASHCARD_COUNT,
  type FlashcardStrategy
} from './flashcard-generator.js';
import { AssistedGapIdentifier, HeuristicGapIdentifier, type GapStrategy } from './gap-identifier.js';
import {
  AssistedGlossaryExtractor,
  DEFAULT_MAX_TERMS,
  HeuristicGlossaryExtractor,
  type GlossaryStrategy
} from './glossary-extractor.js';
import {
  AssistedMethodologyClassifier,
  HeuristicMethodologyClassifier,
  type MethodologyStrategy
} from './methodology-classifier.js';
import { getPatternLibrary, type PatternLibrary } from './patterns.js';
import { DenseSearchStrategy, LexicalSearchStrategy, type SearchStrategy } from './similarity-ranker.js';
import { AssistedSummarizer, HeuristicSummarizer, type SummaryStrategy } from './summarizer.js';
import { countWords } from './text-utils.js';
import type {
  AnalysisRecord,
  CitationReport,
  ComparisonInput,
  ComparisonReport,
  ConceptGraph,
  DocumentProfile,
  DocumentReport,
  FlashcardReport,
  GapReport,
  GlossaryReport,
  MethodologyReport,
  SearchReport,
  SummaryReport
} from './types.js';

export const MIN_COMPARISON_DOCUMENTS = 2;
export const MAX_COMPARISON_DOCUMENTS = 3;

const KIND_LABELS: Record<AnalysisKind, string> = {
  citations: 'Citation extraction',
  methodology: 'Methodology extraction',
  search: 'Semantic search',
  'concept-map': 'Concept mapping',
  gaps: 'Research gap identification',
  glossary: 'Glossary extraction',
  summary: 'Summarization',
  flashcards: 'Flashcard generation',
  comparison: 'Document comparison'
};

export interface AnalysisStrategies {
  citations: CitationAnalyzer;
  methodology: MethodologyStrategy;
  search: SearchStrategy;
  conceptMap: ConceptGraphStrategy;
  gaps: GapStrategy;
  glossary: GlossaryStrategy;
  summary: SummaryStrategy;
  flashcards: FlashcardStrategy;
}

export interface AnalysisFacadeOptions {
  patterns?: PatternLibrary;
  assisted?: AssistedOptions;
  chunker?: ChunkerOptions;
  citations?: CitationAnalyzerOptions;
}

/**
 * Picks the model-backed strategy for every kind whose capability is present and the
 * heuristic strategy otherwise. With no capabilities this is the fully degraded engine.
 */
export const createStrategies = (
  capabilities: CapabilitySet,
  logger: Logger,
  options: AnalysisFacadeOptions = {}
): AnalysisStrategies => {
  const patterns = options.patterns ?? getPatternLibrary();
  const assisted = options.assisted ?? DEFAULT_ASSISTED_OPTIONS;
  const chunker = options.chunker ?? DEFAULT_CHUNKER_OPTIONS;
  const { completion, embedding } = capabilities;

  const methodology = new HeuristicMethodologyClassifier(patterns);
  const lexical = new LexicalSearchStrategy(patterns);
  const conceptMap = new HeuristicConceptGraphBuilder(patterns);
  const gaps = new HeuristicGapIdentifier(patterns);
  const glossary = new HeuristicGlossaryExtractor(patterns);
  const summary = new HeuristicSummarizer(patterns);
  const flashcards = new HeuristicFlashcardGenerator(patterns);

  return {
    citations: new CitationAnalyzer(patterns, options.citations),
    methodology: completion ? new AssistedMethodologyClassifier(methodology, completion, assisted, logger) : methodology,
    search: embedding ? new DenseSearchStrategy(embedding, lexical, chunker, assisted.timeoutMs, logger) : lexical,
    conceptMap: completion ? new AssistedConceptGraphBuilder(conceptMap, completion, assisted, logger, patterns) : conceptMap,
    gaps: completion ? new AssistedGapIdentifier(gaps, completion, assisted, logger) : gaps,
    glossary: completion ? new AssistedGlossaryExtractor(glossary, completion, assisted, logger) : glossary,
    summary: completion ? new AssistedSummarizer(summary, completion, assisted, logger) : summary,
    flashcards: completion ? new AssistedFlashcardGenerator(flashcards, completion, assisted, logger) : flashcards
  };
};

const hasText = (value: unknown): value is string => typeof value === 'string' && value.trim().length > 0;

const intersect = (lists: string[][]): string[] => {
  const [first = [], ...rest] = lists;
  return first.filter((item) => rest.every((list) => list.includes(item)));
};

/**
 * Single entry point for every analysis. Each operation resolves to a structurally complete
 * record; failures come back as the kind's default record with `error` set, never as a rejection.
 */
export class AnalysisFacade {
  constructor(
    private readonly strategies: AnalysisStrategies,
    private readonly logger: Logger
  ) {}

  static fromConfig(config: AppConfig, logger: Logger, capabilities: CapabilitySet): AnalysisFacade {
    const facadeLogger = logger.child({ component: 'analysis' });
    const active = config.analysisMode === 'heuristic' ? {} : capabilities;

    return new AnalysisFacade(
      createStrategies(active, facadeLogger, {
        assisted: {
          timeoutMs: config.capabilityTimeoutMs,
          windowChars: config.completionWindowChars
        },
        chunker: {
          chunkSize: config.chunkSize,
          overlap: config.chunkOverlap,
          minChunkLength: config.minChunkLength
        }
      }),
      facadeLogger
    );
  }

  /** Heuristic-only engine that never reaches an external capability. */
  static heuristic(logger: Logger = new Logger('warn'), options: AnalysisFacadeOptions = {}): AnalysisFacade {
    return new AnalysisFacade(createStrategies({}, logger, options), logger);
  }

  analyzeCitations(text: string): Promise<CitationReport> {
    return this.run('citations', text, emptyCitationReport, (canonical) => this.strategies.citations.analyze(canonical));
  }

  analyzeMethodology(text: string): Promise<MethodologyReport> {
    return this.run('methodology', text, emptyMethodologyReport, (canonical) => this.strategies.methodology.classify(canonical));
  }

  search(query: string, text: string): Promise<SearchReport> {
    return this.run(
      'search',
      text,
      (error) => emptySearchReport(query, error),
      (canonical) => this.strategies.search.search(query, canonical)
    );
  }

  buildConceptMap(text: string): Promise<ConceptGraph> {
    return this.run('concept-map', text, emptyConceptGraph, (canonical) => this.strategies.conceptMap.build(canonical));
  }

  identifyGaps(text: string): Promise<GapReport> {
    return this.run('gaps', text, emptyGapReport, (canonical) => this.strategies.gaps.identify(canonical));
  }

  extractGlossary(text: string, maxTerms: number = DEFAULT_MAX_TERMS): Promise<GlossaryReport> {
    return this.run('glossary', text, emptyGlossaryReport, (canonical) => {
      if (!Number.isInteger(maxTerms) || maxTerms < 1) {
        throw new AnalysisError(`maxTerms must be a positive integer, got ${maxTerms}.`, 'glossary', { maxTerms });
      }
      return this.strategies.glossary.extract(canonical, maxTerms);
    });
  }

  summarize(text: string): Promise<SummaryReport> {
    return this.run('summary', text, emptySummaryReport, (canonical) => this.strategies.summary.summarize(canonical));
  }

  generateFlashcards(text: string, numCards: number = DEFAULT_FLASHCARD_COUNT): Promise<FlashcardReport> {
    return this.run('flashcards', text, emptyFlashcardReport, (canonical) => {
      if (!Number.isInteger(numCards) || numCards < 1 || numCards > MAX_FLASHCARD_COUNT) {
        throw new AnalysisError(`numCards must be an integer from 1 to ${MAX_FLASHCARD_COUNT}, got ${numCards}.`, 'flashcards', {
          numCards
        });
      }
      return this.strategies.flashcards.generate(canonical, numCards);
    });
  }

  /** Profiles two or three documents with the configured strategies and reports what they share. */
  compareDocuments(documents: ComparisonInput[]): Promise<ComparisonReport> {
    return this.attempt('comparison', emptyComparisonReport, async () => {
      const count = Array.isArray(documents) ? documents.length : 0;
      if (count < MIN_COMPARISON_DOCUMENTS || count > MAX_COMPARISON_DOCUMENTS) {
        throw new AnalysisError(
          `expected ${MIN_COMPARISON_DOCUMENTS} to ${MAX_COMPARISON_DOCUMENTS} documents, got ${count}.`,
          'comparison',
          { count }
        );
      }

      const emptyDocument = documents.find((document) => !hasText(document.text));
      if (emptyDocument) {
        throw new AnalysisError(`document "${emptyDocument.label}" has no text.`, 'comparison', { label: emptyDocument.label });
      }

      const profiles = await Promise.all(documents.map((document) => this.profile(document)));

      return {
        documents: profiles,
        sharedDesignCategories: intersect(profiles.map((profile) => profile.designCategories)),
        sharedConcepts: intersect(profiles.map((profile) => profile.concepts)),
        error: null
      };
    });
  }

  /** Every analysis kind over one document, run concurrently. */
  async analyzeDocument(text: string, query?: string): Promise<DocumentReport> {
    const [citations, methodology, search, conceptMap, gaps, glossary] = await Promise.all([
      this.analyzeCitations(text),
      this.analyzeMethodology(text),
      hasText(query) ? this.search(query, text) : Promise.resolve(null),
      this.buildConceptMap(text),
      this.identifyGaps(text),
      this.extractGlossary(text)
    ]);
    const valid = hasText(text);

    return {
      wordCount: valid ? countWords(text) : 0,
      citations,
      methodology,
      search,
      conceptMap,
      gaps,
      glossary,
      error: valid ? null : 'Document text is empty.'
    };
  }

  private async profile(document: ComparisonInput): Promise<DocumentProfile> {
    const [methodology, conceptMap] = await Promise.all([
      this.strategies.methodology.classify(document.text),
      this.strategies.conceptMap.build(document.text)
    ]);

    return {
      label: document.label,
      wordCount: countWords(document.text),
      designCategories: methodology.designCategories,
      techniques: methodology.techniques,
      concepts: conceptMap.nodes.map((node) => node.id)
    };
  }

  private run<T extends AnalysisRecord>(
    kind: AnalysisKind,
    text: string,
    fallback: (error: string) => T,
    task: (canonical: string) => T | Promise<T>
  ): Promise<T> {
    return this.attempt(kind, fallback, () => {
      if (!hasText(text)) {
        throw new AnalysisError('document text is empty.', kind);
      }
      return task(text);
    });
  }

  private async attempt<T extends AnalysisRecord>(
    kind: AnalysisKind,
    fallback: (error: string) => T,
    task: () => T | Promise<T>
  ): Promise<T> {
    try {
      return await task();
    } catch (error) {
      const failure =
        error instanceof AnalysisError ? error : new AnalysisError(describeError(error), kind, { cause: describeError(error) });
      this.logger.warn('Analysis failed, returning default record', {
        kind,
        error: failure.message
      });
      return fallback(`${KIND_LABELS[kind]} failed: ${failure.message}`);
    }
  }
}
