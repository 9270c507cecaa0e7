import { invokeCapability, validateEmbeddings } from '../capabilities/invoke.js';
import type { EmbeddingCapability } from '../capabilities/types.js';
import type { Logger } from '../core/logger.js';
import { withDegradation } from './assisted.js';
import { splitIntoChunks, type ChunkerOptions } from './chunker.js';
import { getPatternLibrary, splitSentences, type PatternLibrary } from './patterns.js';
import type { SearchReport, SearchResult } from './types.js';

export const RELEVANCE_THRESHOLD = 0.3;
export const TOP_K = 5;

const MIN_SENTENCE_LENGTH = 20;

export interface SearchStrategy {
  search(query: string, text: string): SearchReport | Promise<SearchReport>;
}

const queryWords = (query: string): string[] =>
  query
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);

/** Shared result policy for both strategies: threshold, then descending score with ascending index on ties, then top-k. */
export const rankResults = (candidates: SearchResult[]): SearchResult[] =>
  candidates
    .filter((candidate) => candidate.similarity > RELEVANCE_THRESHOLD)
    .sort((left, right) => right.similarity - left.similarity || left.chunkIndex - right.chunkIndex)
    .slice(0, TOP_K);

export const cosineSimilarity = (left: number[], right: number[]): number => {
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (let index = 0; index < Math.min(left.length, right.length); index += 1) {
    const a = left[index] ?? 0;
    const b = right[index] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
};

/** Scores sentence fragments by the share of query words they contain. */
export class LexicalSearchStrategy implements SearchStrategy {
  constructor(private readonly patterns: PatternLibrary = getPatternLibrary()) {}

  search(query: string, text: string): SearchReport {
    const fragments = splitSentences(this.patterns, text);
    const words = queryWords(query);
    const candidates: SearchResult[] = [];

    if (words.length > 0) {
      fragments.forEach((fragment, chunkIndex) => {
        const sentence = fragment.trim();
        if (sentence.length < MIN_SENTENCE_LENGTH) {
          return;
        }

        const lower = sentence.toLowerCase();
        const hits = words.filter((word) => lower.includes(word)).length;
        candidates.push({ text: sentence, similarity: hits / words.length, chunkIndex });
      });
    }

    return {
      query,
      results: rankResults(candidates),
      totalChunksSearched: fragments.length,
      strategy: 'lexical',
      degradedReason: null,
      error: null
    };
  }
}

/** Embeds the query with every chunk in one call and ranks chunks by cosine similarity. */
export class DenseSearchStrategy implements SearchStrategy {
  constructor(
    private readonly embedding: EmbeddingCapability,
    private readonly fallback: LexicalSearchStrategy,
    private readonly chunkerOptions: ChunkerOptions,
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {}

  async search(query: string, text: string): Promise<SearchReport> {
    if (queryWords(query).length === 0) {
      return this.fallback.search(query, text);
    }

    const chunks = splitIntoChunks(text, this.chunkerOptions);

    return withDegradation<SearchReport>(
      'search',
      this.logger,
      async () => {
        const inputs = [query, ...chunks.map((chunk) => chunk.text)];
        const vectors = validateEmbeddings(
          await invokeCapability('embedding', this.timeoutMs, (signal) => this.embedding.embed(inputs, { signal })),
          inputs.length
        );
        const [queryVector = [], ...chunkVectors] = vectors;

        const candidates = chunks.map((chunk, position) => ({
          text: chunk.text,
          similarity: cosineSimilarity(queryVector, chunkVectors[position] ?? []),
          chunkIndex: chunk.index
        }));

        return {
          query,
          results: rankResults(candidates),
          totalChunksSearched: chunks.length,
          strategy: 'dense',
          degradedReason: null,
          error: null
        };
      },
      (reason) => ({ ...this.fallback.search(query, text), degradedReason: reason })
    );
  }
}
