import { describe, expect, it } from 'vitest';
import { AnalysisFacade, createStrategies } from '../src/analysis/analysis-facade.js';
import { emptyCitationReport } from '../src/analysis/defaults.js';
import type { CompletionCapability } from '../src/capabilities/types.js';
import { Logger } from '../src/core/logger.js';

const logger = new Logger('error', {}, () => {});

const failingCompletion: CompletionCapability = {
  complete: async () => {
    throw new Error('connection reset');
  }
};

const paper =
  'This paper proposes a new algorithm [1]. Smith et al., 2020 showed similar results. We use a neural network for classification. A limitation of this method is the small data sample.';

describe('AnalysisFacade', () => {
  const facade = AnalysisFacade.heuristic(logger);

  it('returns default records with an error for empty text', async () => {
    await expect(facade.analyzeCitations('')).resolves.toEqual(
      emptyCitationReport('Citation extraction failed: document text is empty.')
    );
    await expect(facade.search('neural', '   ')).resolves.toMatchObject({
      query: 'neural',
      results: [],
      error: 'Semantic search failed: document text is empty.'
    });
    await expect(facade.identifyGaps('\n')).resolves.toMatchObject({
      categories: [],
      error: 'Research gap identification failed: document text is empty.'
    });
  });

  it('returns an error record for text that is not a string', async () => {
    const report: unknown = await Reflect.apply(facade.analyzeCitations, facade, [undefined]);

    expect(report).toEqual(emptyCitationReport('Citation extraction failed: document text is empty.'));
  });

  it('turns invalid arguments into an error record', async () => {
    const report = await facade.extractGlossary(paper, 0);

    expect(report.terms).toEqual([]);
    expect(report.error).toBe('Glossary extraction failed: maxTerms must be a positive integer, got 0.');
  });

  it('turns analyzer failures into an error record', async () => {
    const broken = new AnalysisFacade(
      {
        ...createStrategies({}, logger),
        methodology: {
          classify: () => {
            throw new Error('boom');
          }
        }
      },
      logger
    );

    const report = await broken.analyzeMethodology(paper);

    expect(report.error).toBe('Methodology extraction failed: boom');
    expect(report.designCategories).toEqual([]);
  });

  it('degrades model-backed strategies without reporting an error', async () => {
    const degraded = new AnalysisFacade(createStrategies({ completion: failingCompletion }, logger), logger);

    const report = await degraded.analyzeMethodology(paper);

    expect(report.error).toBeNull();
    expect(report.strategy).toBe('heuristic');
    expect(report.degradedReason).toBe('The completion capability failed: connection reset');
    expect(report.designCategories).toEqual(['computational']);
  });

  it('summarizes and writes flashcards', async () => {
    await expect(facade.summarize(paper)).resolves.toMatchObject({
      shortSummary: 'We use a neural network for classification. A limitation of this method is the small data sample.',
      strategy: 'heuristic',
      error: null
    });

    const cards = await facade.generateFlashcards(paper, 1);
    expect(cards.flashcards).toEqual([
      {
        id: 1,
        question: 'What is limitation of this method?',
        answer: 'The small data sample.',
        kind: 'definition'
      }
    ]);
  });

  it('rejects an out-of-range card count', async () => {
    await expect(facade.generateFlashcards(paper, 21)).resolves.toEqual({
      flashcards: [],
      totalCards: 0,
      strategy: 'heuristic',
      degradedReason: null,
      error: 'Flashcard generation failed: numCards must be an integer from 1 to 20, got 21.'
    });
  });

  it('degrades summaries and flashcards when the completion capability fails', async () => {
    const degraded = new AnalysisFacade(createStrategies({ completion: failingCompletion }, logger), logger);

    const summary = await degraded.summarize(paper);
    const cards = await degraded.generateFlashcards(paper);

    expect(summary).toMatchObject({ strategy: 'heuristic', error: null });
    expect(summary.degradedReason).toBe('The completion capability failed: connection reset');
    expect(cards).toMatchObject({ strategy: 'heuristic', totalCards: 2, error: null });
    expect(cards.degradedReason).toBe('The completion capability failed: connection reset');
  });

  it('runs every analysis in one report', async () => {
    const report = await facade.analyzeDocument(paper, 'neural network');

    expect(report.error).toBeNull();
    expect(report.wordCount).toBe(31);
    expect(report.citations.totalCitations).toBe(2);
    expect(report.search?.results[0]).toEqual({
      text: 'We use a neural network for classification',
      similarity: 1,
      chunkIndex: 3
    });
    expect(report.gaps.categories).toEqual(['Methodological', 'Empirical']);
  });

  it('omits search without a query and flags empty documents', async () => {
    expect((await facade.analyzeDocument(paper)).search).toBeNull();

    const empty = await facade.analyzeDocument('  ');
    expect(empty.error).toBe('Document text is empty.');
    expect(empty.citations.error).toBe('Citation extraction failed: document text is empty.');
  });

  describe('compareDocuments', () => {
    it('reports shared design categories and concepts', async () => {
      const report = await facade.compareDocuments([
        { label: 'A', text: 'We ran an experiment with Graph Models.' },
        { label: 'B', text: 'A survey and an experiment about Graph Models.' }
      ]);

      expect(report).toEqual({
        documents: [
          {
            label: 'A',
            wordCount: 7,
            designCategories: ['experimental', 'theoretical'],
            techniques: [],
            concepts: ['Graph Models']
          },
          {
            label: 'B',
            wordCount: 8,
            designCategories: ['experimental', 'observational', 'theoretical'],
            techniques: [],
            concepts: ['Graph Models']
          }
        ],
        sharedDesignCategories: ['experimental', 'theoretical'],
        sharedConcepts: ['Graph Models'],
        error: null
      });
    });

    it('rejects too few documents and empty documents', async () => {
      await expect(facade.compareDocuments([{ label: 'A', text: 'Some text here.' }])).resolves.toMatchObject({
        documents: [],
        error: 'Document comparison failed: expected 2 to 3 documents, got 1.'
      });
      await expect(
        facade.compareDocuments([
          { label: 'A', text: 'Some text here.' },
          { label: 'B', text: ' ' }
        ])
      ).resolves.toMatchObject({ error: 'Document comparison failed: document "B" has no text.' });

      const missingText: unknown = await Reflect.apply(facade.compareDocuments, facade, [
        [{ label: 'A', text: 'Some text here.' }, { label: 'C' }]
      ]);
      expect(missingText).toMatchObject({ documents: [], error: 'Document comparison failed: document "C" has no text.' });
    });
  });
});
