import { describe, expect, it } from 'vitest';
import { DEFAULT_ASSISTED_OPTIONS } from '../src/analysis/assisted.js';
import { AssistedGapIdentifier, HeuristicGapIdentifier } from '../src/analysis/gap-identifier.js';
import { Logger } from '../src/core/logger.js';

const logger = new Logger('error', {}, () => {});

const text =
  'Our method has a limitation in handling noisy data. Future work should examine theory. Short limitation. This sentence is fine and unrelated to anything.';

describe('HeuristicGapIdentifier', () => {
  it('collects limitation sentences and categorizes them', () => {
    const report = new HeuristicGapIdentifier().identify(text);

    expect(report.limitationSentences).toEqual([
      'Our method has a limitation in handling noisy data',
      'Future work should examine theory'
    ]);
    expect(report.categories).toEqual(['Methodological', 'Theoretical', 'Empirical']);
    expect(report.confidence).toBe(0.6);
    expect(report.narrative).toBe(
      [
        'Identified Research Gaps:',
        '',
        '1. Methodological Gaps: Present',
        '2. Theoretical Gaps: Present',
        '3. Empirical Gaps: Present',
        '4. Technological Gaps: Not identified',
        '',
        'Key Limitations Found:',
        '- Our method has a limitation in handling noisy data',
        '- Future work should examine theory',
        '',
        'Future Research Directions:',
        '- Extend current methodology to larger datasets',
        '- Investigate alternative approaches',
        '- Address identified limitations',
        '- Explore cross-domain applications'
      ].join('\n')
    );
  });

  it('reports a general category and low confidence when nothing is found', () => {
    const report = new HeuristicGapIdentifier().identify('Everything worked as expected in all trials.');

    expect(report.limitationSentences).toEqual([]);
    expect(report.categories).toEqual(['General']);
    expect(report.confidence).toBe(0.3);
    expect(report.narrative.split('\n')).toContain('- No explicit limitations mentioned');
  });

  it('shortens long limitation excerpts in the narrative', () => {
    const sentence = `A drawback ${'x'.repeat(120)}`;
    const report = new HeuristicGapIdentifier().identify(sentence);

    expect(report.narrative.split('\n')).toContain(`- ${sentence.slice(0, 100)}...`);
  });
});

describe('AssistedGapIdentifier', () => {
  const heuristic = new HeuristicGapIdentifier();

  it('adds the model narrative and raises confidence', async () => {
    const identifier = new AssistedGapIdentifier(
      heuristic,
      { complete: async () => 'The study leaves noisy-data robustness unexplored.' },
      DEFAULT_ASSISTED_OPTIONS,
      logger
    );

    const report = await identifier.identify(text);

    expect(report.modelNarrative).toBe('The study leaves noisy-data robustness unexplored.');
    expect(report.confidence).toBe(0.8);
    expect(report.strategy).toBe('assisted');
    expect(report.categories).toEqual(['Methodological', 'Theoretical', 'Empirical']);
  });

  it('degrades when the completion fails', async () => {
    const identifier = new AssistedGapIdentifier(
      heuristic,
      {
        complete: async () => {
          throw new Error('quota exceeded');
        }
      },
      DEFAULT_ASSISTED_OPTIONS,
      logger
    );

    await expect(identifier.identify(text)).resolves.toEqual({
      ...heuristic.identify(text),
      degradedReason: 'The completion capability failed: quota exceeded'
    });
  });
});
