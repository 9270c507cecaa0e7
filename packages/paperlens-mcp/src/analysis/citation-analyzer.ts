import {
  findMatches,
  getPatternLibrary,
  stripLeadingFunctionWords,
  type PatternLibrary
} from './patterns.js';
import { roundedMean } from './text-utils.js';
import type {
  AuthorMentionCount,
  CitationMention,
  CitationNetwork,
  CitationNetworkEdge,
  CitationNetworkNode,
  CitationReport
} from './types.js';

export const UNKNOWN_AUTHOR = 'Unknown';

/**
 * Optional extension point for linking cited authors. The default network has nodes only;
 * edges whose endpoints are not nodes, self-loops and repeats are discarded.
 */
export type CitationEdgeBuilder = (citations: readonly CitationMention[]) => CitationNetworkEdge[];

export interface CitationAnalyzerOptions {
  now?: () => Date;
  edgeBuilder?: CitationEdgeBuilder;
  maxAuthors?: number;
  maxNetworkNodes?: number;
}

const countInOrder = <T>(values: T[]): Map<T, number> => {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
};

// Array.prototype.sort is stable, so equal counts keep first-seen order.
const byCountDescending = <T>(counts: Map<T, number>): Array<[T, number]> =>
  [...counts.entries()].sort((left, right) => right[1] - left[1]);

export class CitationAnalyzer {
  private readonly now: () => Date;
  private readonly maxAuthors: number;
  private readonly maxNetworkNodes: number;

  constructor(
    private readonly patterns: PatternLibrary = getPatternLibrary(),
    private readonly options: CitationAnalyzerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.maxAuthors = options.maxAuthors ?? 5;
    this.maxNetworkNodes = options.maxNetworkNodes ?? 10;
  }

  analyze(text: string): CitationReport {
    const mentions = this.extractMentions(text);
    const years = findMatches(this.patterns.year, text).map((match) => Number(match.text));
    const yearCounts = countInOrder(years);
    const currentYear = this.now().getFullYear();

    return {
      totalCitations: mentions.length,
      citations: this.deduplicate(mentions),
      publicationYears: byCountDescending(yearCounts).map(([year]) => year),
      yearCounts: Object.fromEntries([...yearCounts.entries()].map(([year, count]) => [String(year), count])),
      mostCitedAuthors: this.mostCitedAuthors(text),
      avgCitationAge: roundedMean(years.map((year) => currentYear - year)),
      citationDiversity: new Set(mentions.map((mention) => mention.rawMention)).size,
      citationNetwork: this.buildNetwork(mentions),
      error: null
    };
  }

  /** Raw mentions from every citation pattern in turn; overlapping matches from different patterns all count. */
  extractMentions(text: string): CitationMention[] {
    return this.patterns.citationPatterns.flatMap(({ kind, pattern }) =>
      findMatches(pattern, text).map((match) => ({
        rawMention: match.text,
        kind,
        author: this.firstAuthor(match.text),
        year: this.firstYear(match.text)
      }))
    );
  }

  private firstAuthor(mention: string): string | null {
    for (const match of findMatches(this.patterns.properNounPhrase, mention)) {
      const author = stripLeadingFunctionWords(this.patterns, match.text);
      if (author.length > 0) {
        return author;
      }
    }
    return null;
  }

  private firstYear(mention: string): number | null {
    const [match] = findMatches(this.patterns.year, mention);
    return match ? Number(match.text) : null;
  }

  private deduplicate(mentions: CitationMention[]): CitationMention[] {
    const seen = new Set<string>();

    return mentions.filter((mention) => {
      if (mention.author === null || mention.year === null) {
        return true;
      }

      const key = `${mention.author}\u0000${mention.year}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }

  private mostCitedAuthors(text: string): AuthorMentionCount[] {
    const authors = findMatches(this.patterns.authorYear, text)
      .map((match) => stripLeadingFunctionWords(this.patterns, match.groups[0] ?? ''))
      .filter((author) => author.length > 0);

    return byCountDescending(countInOrder(authors))
      .slice(0, this.maxAuthors)
      .map(([author, mentions]) => ({ author, mentions }));
  }

  private buildNetwork(mentions: CitationMention[]): CitationNetwork {
    const nodes = new Map<string, CitationNetworkNode>();
    for (const mention of mentions) {
      const id = mention.author ?? UNKNOWN_AUTHOR;
      if (!nodes.has(id)) {
        nodes.set(id, { id, title: mention.rawMention });
      }
    }

    const edges: CitationNetworkEdge[] = [];
    const edgeKeys = new Set<string>();
    for (const edge of this.options.edgeBuilder?.(mentions) ?? []) {
      const key = `${edge.source}\u0000${edge.target}`;
      if (edge.source === edge.target || !nodes.has(edge.source) || !nodes.has(edge.target) || edgeKeys.has(key)) {
        continue;
      }
      edgeKeys.add(key);
      edges.push({ source: edge.source, target: edge.target });
    }

    return {
      nodeCount: nodes.size,
      edgeCount: edges.length,
      nodes: [...nodes.values()].slice(0, this.maxNetworkNodes),
      edges
    };
  }
}
