import { describe, expect, it } from 'vitest';
import { DEFAULT_ASSISTED_OPTIONS } from '../src/analysis/assisted.js';
import { AssistedFlashcardGenerator, HeuristicFlashcardGenerator } from '../src/analysis/flashcard-generator.js';
import { Logger } from '../src/core/logger.js';

const logger = new Logger('error', {}, () => {});

const text =
  'Transformers are a family of neural architectures for sequence modelling. We evaluate them on three benchmark corpora. The main limitation was the memory cost of attention on long inputs. Future work should study sparse attention for documents.';

describe('HeuristicFlashcardGenerator', () => {
  const generator = new HeuristicFlashcardGenerator();

  it('builds definition cards before limitation cards', () => {
    expect(generator.generate(text)).toEqual({
      flashcards: [
        {
          id: 1,
          question: 'What are Transformers?',
          answer: 'A family of neural architectures for sequence modelling.',
          kind: 'definition'
        },
        {
          id: 2,
          question: 'Complete the statement: "The main limitation was..."',
          answer: 'The main limitation was the memory cost of attention on long inputs.',
          kind: 'limitation'
        },
        {
          id: 3,
          question: 'Complete the statement: "Future work should study..."',
          answer: 'Future work should study sparse attention for documents.',
          kind: 'limitation'
        }
      ],
      totalCards: 3,
      strategy: 'heuristic',
      degradedReason: null,
      error: null
    });
  });

  it('strips leading function words and skips repeated subjects', () => {
    const cards = generator.definitionCards(
      'The encoder is the component that reads the input. An Encoder is a duplicate. Graphs are made of nodes.'
    );

    expect(cards).toEqual([{ question: 'What is encoder?', answer: 'The component that reads the input.', kind: 'definition' }]);
  });

  it('caps the deck at numCards', () => {
    const report = generator.generate(text, 2);

    expect(report.totalCards).toBe(2);
    expect(report.flashcards.map((card) => card.id)).toEqual([1, 2]);
  });
});

describe('AssistedFlashcardGenerator', () => {
  const heuristic = new HeuristicFlashcardGenerator();

  it('keeps model cards with a real question and answer', async () => {
    const generator = new AssistedFlashcardGenerator(
      heuristic,
      {
        complete: async () =>
          '```json\n[{"question": "What do the authors evaluate?", "answer": "Transformers on three benchmark corpora."}, {"question": "Why?", "answer": "Because they can."}, {"question": "What limits attention?", "answer": "Memory cost on long inputs."}]\n```'
      },
      DEFAULT_ASSISTED_OPTIONS,
      logger
    );

    const report = await generator.generate(text, 8);

    expect(report.strategy).toBe('assisted');
    expect(report.totalCards).toBe(2);
    expect(report.flashcards).toEqual([
      { id: 1, question: 'What do the authors evaluate?', answer: 'Transformers on three benchmark corpora.', kind: 'model' },
      { id: 2, question: 'What limits attention?', answer: 'Memory cost on long inputs.', kind: 'model' }
    ]);
  });

  it('degrades to heuristic cards when the model output has no usable card', async () => {
    const generator = new AssistedFlashcardGenerator(
      heuristic,
      { complete: async () => '[{"question": "Why?", "answer": "No."}]' },
      DEFAULT_ASSISTED_OPTIONS,
      logger
    );

    await expect(generator.generate(text, 3)).resolves.toEqual({
      ...heuristic.generate(text, 3),
      degradedReason: 'The completion capability returned no usable flashcards.'
    });
  });

  it('degrades when the capability fails', async () => {
    const generator = new AssistedFlashcardGenerator(
      heuristic,
      {
        complete: async () => {
          throw new Error('rate limited');
        }
      },
      DEFAULT_ASSISTED_OPTIONS,
      logger
    );

    const report = await generator.generate(text);

    expect(report.strategy).toBe('heuristic');
    expect(report.degradedReason).toBe('The completion capability failed: rate limited');
    expect(report.totalCards).toBe(3);
  });
});
