import type { CitationKind } from './patterns.js';

export type AssistedStrategyName = 'heuristic' | 'assisted';

export type SearchStrategyName = 'lexical' | 'dense';

/** Every analysis result carries `error`; a populated value means the other fields hold defaults. */
export interface AnalysisRecord {
  error: string | null;
}

export interface DegradableRecord<TStrategy extends string> extends AnalysisRecord {
  strategy: TStrategy;
  degradedReason: string | null;
}

export interface Chunk {
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  wordStart: number;
  wordEnd: number;
}

export interface CitationMention {
  rawMention: string;
  kind: CitationKind;
  author: string | null;
  year: number | null;
}

export interface AuthorMentionCount {
  author: string;
  mentions: number;
}

export interface CitationNetworkNode {
  id: string;
  title: string;
}

export interface CitationNetworkEdge {
  source: string;
  target: string;
}

export interface CitationNetwork {
  nodeCount: number;
  edgeCount: number;
  nodes: CitationNetworkNode[];
  edges: CitationNetworkEdge[];
}

export interface CitationReport extends AnalysisRecord {
  totalCitations: number;
  citations: CitationMention[];
  publicationYears: number[];
  yearCounts: Record<string, number>;
  mostCitedAuthors: AuthorMentionCount[];
  avgCitationAge: number;
  citationDiversity: number;
  citationNetwork: CitationNetwork;
}

export interface MethodologyReport extends DegradableRecord<AssistedStrategyName> {
  designCategories: string[];
  researchMethods: string[];
  techniques: string[];
  narrative: string;
  modelNarrative: string | null;
  confidence: number;
}

export interface SearchResult {
  text: string;
  similarity: number;
  chunkIndex: number;
}

export interface SearchReport extends DegradableRecord<SearchStrategyName> {
  query: string;
  results: SearchResult[];
  totalChunksSearched: number;
}

export interface ConceptNode {
  id: string;
  label: string;
}

export interface ConceptEdge {
  source: string;
  target: string;
}

export interface ConceptGraph extends DegradableRecord<AssistedStrategyName> {
  nodes: ConceptNode[];
  edges: ConceptEdge[];
  stats: {
    totalConcepts: number;
    totalConnections: number;
  };
}

export interface GapReport extends DegradableRecord<AssistedStrategyName> {
  limitationSentences: string[];
  categories: string[];
  narrative: string;
  modelNarrative: string | null;
  confidence: number;
}

export interface GlossaryEntry {
  term: string;
  definition: string;
  source: 'context' | 'model';
}

export interface GlossaryReport extends DegradableRecord<AssistedStrategyName> {
  terms: GlossaryEntry[];
}

export interface SummaryReport extends DegradableRecord<AssistedStrategyName> {
  shortSummary: string;
  detailedSummary: string;
}

export type FlashcardKind = 'definition' | 'limitation' | 'model';

export interface Flashcard {
  id: number;
  question: string;
  answer: string;
  kind: FlashcardKind;
}

export interface FlashcardReport extends DegradableRecord<AssistedStrategyName> {
  flashcards: Flashcard[];
  totalCards: number;
}

export interface ComparisonInput {
  label: string;
  text: string;
}

export interface DocumentProfile {
  label: string;
  wordCount: number;
  designCategories: string[];
  techniques: string[];
  concepts: string[];
}

export interface ComparisonReport extends AnalysisRecord {
  documents: DocumentProfile[];
  sharedDesignCategories: string[];
  sharedConcepts: string[];
}

export interface DocumentReport extends AnalysisRecord {
  wordCount: number;
  citations: CitationReport;
  methodology: MethodologyReport;
  search: SearchReport | null;
  conceptMap: ConceptGraph;
  gaps: GapReport;
  glossary: GlossaryReport;
}
