import { describe, expect, it } from 'vitest';
import { DEFAULT_ASSISTED_OPTIONS } from '../src/analysis/assisted.js';
import {
  AssistedGlossaryExtractor,
  cleanDefinition,
  HeuristicGlossaryExtractor
} from '../src/analysis/glossary-extractor.js';
import { Logger } from '../src/core/logger.js';

const logger = new Logger('error', {}, () => {});

const text =
  'We propose the LSTM model for sequence tasks. Deep Learning Models outperform baselines. The algorithm converges quickly.';

describe('HeuristicGlossaryExtractor', () => {
  it('lists technical terms in order of first use', () => {
    expect(new HeuristicGlossaryExtractor().terms(text, 15)).toEqual([
      'LSTM',
      'model',
      'Deep Learning Models',
      'Learning',
      'Models',
      'algorithm'
    ]);
  });

  it('defines terms by the first sentence that uses them', () => {
    const report = new HeuristicGlossaryExtractor().extract(text, 3);

    expect(report.terms).toEqual([
      { term: 'LSTM', definition: 'We propose the LSTM model for sequence tasks.', source: 'context' },
      { term: 'model', definition: 'We propose the LSTM model for sequence tasks.', source: 'context' },
      { term: 'Deep Learning Models', definition: 'Deep Learning Models outperform baselines.', source: 'context' }
    ]);
    expect(report.strategy).toBe('heuristic');
  });
});

describe('cleanDefinition', () => {
  it('drops a repeated term and capitalizes', () => {
    expect(cleanDefinition('LSTM: a recurrent network', 'LSTM')).toBe('A recurrent network');
    expect(cleanDefinition('bert is a language model', 'BERT')).toBe('A language model');
    expect(cleanDefinition('  plain definition ', 'term')).toBe('Plain definition');
  });
});

describe('AssistedGlossaryExtractor', () => {
  const heuristic = new HeuristicGlossaryExtractor();

  it('uses model definitions that are long enough and keeps context for the rest', async () => {
    const extractor = new AssistedGlossaryExtractor(
      heuristic,
      {
        complete: async () =>
          'Here you go: {"LSTM": "LSTM: a recurrent network that keeps long-term memory", "model": "short"}'
      },
      DEFAULT_ASSISTED_OPTIONS,
      logger
    );

    const report = await extractor.extract(text, 2);

    expect(report.strategy).toBe('assisted');
    expect(report.terms).toEqual([
      { term: 'LSTM', definition: 'A recurrent network that keeps long-term memory', source: 'model' },
      { term: 'model', definition: 'We propose the LSTM model for sequence tasks.', source: 'context' }
    ]);
  });

  it('degrades on output that is not a definition map', async () => {
    const extractor = new AssistedGlossaryExtractor(
      heuristic,
      { complete: async () => 'I cannot define these terms right now.' },
      DEFAULT_ASSISTED_OPTIONS,
      logger
    );

    await expect(extractor.extract(text, 2)).resolves.toEqual({
      ...heuristic.extract(text, 2),
      degradedReason: 'The completion capability returned malformed definitions.'
    });
  });

  it('skips the model when there are no terms', async () => {
    let calls = 0;
    const extractor = new AssistedGlossaryExtractor(
      heuristic,
      {
        complete: async () => {
          calls += 1;
          return '{}';
        }
      },
      DEFAULT_ASSISTED_OPTIONS,
      logger
    );

    const report = await extractor.extract('all lowercase words only', 5);

    expect(report.terms).toEqual([]);
    expect(calls).toBe(0);
  });
});
