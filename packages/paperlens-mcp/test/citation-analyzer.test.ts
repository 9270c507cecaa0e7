import { describe, expect, it } from 'vitest';
import { CitationAnalyzer } from '../src/analysis/citation-analyzer.js';
import { getPatternLibrary } from '../src/analysis/patterns.js';

const now = () => new Date('2024-06-01T00:00:00Z');

describe('CitationAnalyzer', () => {
  it('counts numeric and narrative citations', () => {
    const analyzer = new CitationAnalyzer(getPatternLibrary(), { now });

    const report = analyzer.analyze('This paper proposes a new algorithm [1]. Smith et al., 2020 showed similar results.');

    expect(report).toEqual({
      totalCitations: 2,
      citations: [
        { rawMention: '[1]', kind: 'numeric', author: null, year: null },
        { rawMention: 'Smith et al., 2020', kind: 'narrative', author: 'Smith', year: 2020 }
      ],
      publicationYears: [2020],
      yearCounts: { '2020': 1 },
      mostCitedAuthors: [{ author: 'Smith', mentions: 1 }],
      avgCitationAge: 4,
      citationDiversity: 2,
      citationNetwork: {
        nodeCount: 2,
        edgeCount: 0,
        nodes: [
          { id: 'Unknown', title: '[1]' },
          { id: 'Smith', title: 'Smith et al., 2020' }
        ],
        edges: []
      },
      error: null
    });
  });

  const repeated = 'Earlier studies (Jones, 2019) and (Jones, 2019) agree. Lee et al., 2021 disagree.';

  it('deduplicates by author and year while counting every mention', () => {
    const report = new CitationAnalyzer(getPatternLibrary(), { now }).analyze(repeated);

    expect(report.totalCitations).toBe(3);
    expect(report.citations.map((citation) => citation.rawMention)).toEqual(['(Jones, 2019)', 'Lee et al., 2021']);
    expect(report.citationDiversity).toBe(2);
    expect(report.publicationYears).toEqual([2019, 2021]);
    expect(report.yearCounts).toEqual({ '2019': 2, '2021': 1 });
    expect(report.mostCitedAuthors).toEqual([
      { author: 'Jones', mentions: 2 },
      { author: 'Lee', mentions: 1 }
    ]);
    expect(report.avgCitationAge).toBe(4.33);
  });

  it('keeps only valid edges from the edge builder', () => {
    const analyzer = new CitationAnalyzer(getPatternLibrary(), {
      now,
      edgeBuilder: () => [
        { source: 'Jones', target: 'Lee' },
        { source: 'Jones', target: 'Lee' },
        { source: 'Lee', target: 'Lee' },
        { source: 'Jones', target: 'Nobody' }
      ]
    });

    const network = analyzer.analyze(repeated).citationNetwork;

    expect(network.edges).toEqual([{ source: 'Jones', target: 'Lee' }]);
    expect(network.edgeCount).toBe(1);
  });

  it('caps listed nodes while reporting the full node count', () => {
    const network = new CitationAnalyzer(getPatternLibrary(), { now, maxNetworkNodes: 1 }).analyze(repeated).citationNetwork;

    expect(network.nodeCount).toBe(2);
    expect(network.nodes).toEqual([{ id: 'Jones', title: '(Jones, 2019)' }]);
  });

  it('does not take a leading function word as an author', () => {
    const [mention] = new CitationAnalyzer(getPatternLibrary(), { now }).extractMentions('As shown earlier (In 2020).');

    expect(mention).toEqual({ rawMention: '(In 2020)', kind: 'parenthetical', author: null, year: 2020 });
  });

  it('reports zeros for text without citations', () => {
    const report = new CitationAnalyzer(getPatternLibrary(), { now }).analyze('No references appear in this sentence.');

    expect(report.totalCitations).toBe(0);
    expect(report.avgCitationAge).toBe(0);
    expect(report.mostCitedAuthors).toEqual([]);
    expect(report.citationNetwork).toEqual({ nodeCount: 0, edgeCount: 0, nodes: [], edges: [] });
  });
});
