import type {
  CitationReport,
  ComparisonReport,
  ConceptGraph,
  FlashcardReport,
  GapReport,
  GlossaryReport,
  MethodologyReport,
  SearchReport,
  SummaryReport
} from './types.js';

export const emptyCitationReport = (error: string | null): CitationReport => ({
  totalCitations: 0,
  citations: [],
  publicationYears: [],
  yearCounts: {},
  mostCitedAuthors: [],
  avgCitationAge: 0,
  citationDiversity: 0,
  citationNetwork: { nodeCount: 0, edgeCount: 0, nodes: [], edges: [] },
  error
});

export const emptyMethodologyReport = (error: string | null): MethodologyReport => ({
  designCategories: [],
  researchMethods: [],
  techniques: [],
  narrative: '',
  modelNarrative: null,
  confidence: 0,
  strategy: 'heuristic',
  degradedReason: null,
  error
});

export const emptySearchReport = (query: string, error: string | null): SearchReport => ({
  query,
  results: [],
  totalChunksSearched: 0,
  strategy: 'lexical',
  degradedReason: null,
  error
});

export const emptyConceptGraph = (error: string | null): ConceptGraph => ({
  nodes: [],
  edges: [],
  stats: { totalConcepts: 0, totalConnections: 0 },
  strategy: 'heuristic',
  degradedReason: null,
  error
});

export const emptyGapReport = (error: string | null): GapReport => ({
  limitationSentences: [],
  categories: [],
  narrative: '',
  modelNarrative: null,
  confidence: 0,
  strategy: 'heuristic',
  degradedReason: null,
  error
});

export const emptyGlossaryReport = (error: string | null): GlossaryReport => ({
  terms: [],
  strategy: 'heuristic',
  degradedReason: null,
  error
});

export const emptyComparisonReport = (error: string | null): ComparisonReport => ({
  documents: [],
  sharedDesignCategories: [],
  sharedConcepts: [],
  error
});

export const emptySummaryReport = (error: string | null): SummaryReport => ({
  shortSummary: '',
  detailedSummary: '',
  strategy: 'heuristic',
  degradedReason: null,
  error
});

export const emptyFlashcardReport = (error: string | null): FlashcardReport => ({
  flashcards: [],
  totalCards: 0,
  strategy: 'heuristic',
  degradedReason: null,
  error
});
