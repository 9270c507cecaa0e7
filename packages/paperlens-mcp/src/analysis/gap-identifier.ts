import type { CompletionCapability } from '../capabilities/types.js';
import type { Logger } from '../core/logger.js';
import { requestCompletion, withDegradation, type AssistedOptions } from './assisted.js';
import { containsAny, getPatternLibrary, splitSentences, type PatternLibrary } from './patterns.js';
import { textWindow } from './text-utils.js';
import type { GapReport } from './types.js';

export const GAP_CONFIDENCE = {
  heuristic: { found: 0.6, none: 0.3 },
  assisted: { found: 0.8, none: 0.3 }
} as const;

export const GENERAL_GAP_CATEGORY = 'General';

const MIN_GAP_SENTENCE_LENGTH = 30;
const NARRATIVE_SENTENCES = 3;
const NARRATIVE_EXCERPT_LENGTH = 100;
const GAPS_MAX_TOKENS = 800;

const FUTURE_DIRECTIONS = [
  'Extend current methodology to larger datasets',
  'Investigate alternative approaches',
  'Address identified limitations',
  'Explore cross-domain applications'
];

export interface GapStrategy {
  identify(text: string): GapReport | Promise<GapReport>;
}

const presence = (categories: string[], category: string): string =>
  categories.includes(category) ? 'Present' : 'Not identified';

const excerpt = (sentence: string): string =>
  sentence.length > NARRATIVE_EXCERPT_LENGTH ? `${sentence.slice(0, NARRATIVE_EXCERPT_LENGTH)}...` : sentence;

const renderNarrative = (sentences: string[], categories: string[]): string => {
  const limitations =
    sentences.length > 0
      ? sentences.slice(0, NARRATIVE_SENTENCES).map((sentence) => `- ${excerpt(sentence)}`)
      : ['- No explicit limitations mentioned'];

  return [
    'Identified Research Gaps:',
    '',
    `1. Methodological Gaps: ${presence(categories, 'Methodological')}`,
    `2. Theoretical Gaps: ${presence(categories, 'Theoretical')}`,
    `3. Empirical Gaps: ${presence(categories, 'Empirical')}`,
    `4. Technological Gaps: ${presence(categories, 'Technological')}`,
    '',
    'Key Limitations Found:',
    ...limitations,
    '',
    'Future Research Directions:',
    ...FUTURE_DIRECTIONS.map((direction) => `- ${direction}`)
  ].join('\n');
};

export class HeuristicGapIdentifier implements GapStrategy {
  constructor(private readonly patterns: PatternLibrary = getPatternLibrary()) {}

  /** Sentences of at least 30 characters that carry a limitation or future-work indicator. */
  findGapSentences(text: string): string[] {
    return splitSentences(this.patterns, text)
      .map((fragment) => fragment.trim())
      .filter(
        (sentence) =>
          sentence.length >= MIN_GAP_SENTENCE_LENGTH && containsAny(sentence.toLowerCase(), this.patterns.gapIndicators)
      );
  }

  categorize(sentences: string[]): string[] {
    const lowered = sentences.map((sentence) => sentence.toLowerCase());
    const categories = this.patterns.gapCategories
      .filter(({ keyword }) => lowered.some((sentence) => sentence.includes(keyword)))
      .map(({ category }) => category);

    return categories.length > 0 ? categories : [GENERAL_GAP_CATEGORY];
  }

  identify(text: string): GapReport {
    const limitationSentences = this.findGapSentences(text);
    const categories = this.categorize(limitationSentences);

    return {
      limitationSentences,
      categories,
      narrative: renderNarrative(limitationSentences, categories),
      modelNarrative: null,
      confidence: limitationSentences.length > 0 ? GAP_CONFIDENCE.heuristic.found : GAP_CONFIDENCE.heuristic.none,
      strategy: 'heuristic',
      degradedReason: null,
      error: null
    };
  }
}

export const buildGapPrompt = (excerptText: string): string => `Analyze this research paper text and identify:

1. Limitations mentioned by the authors
2. Potential research gaps
3. Future work suggestions
4. Unexplored areas
5. Methodological improvements needed

Be specific and refer to the text.

Text:
${excerptText}`;

export class AssistedGapIdentifier implements GapStrategy {
  constructor(
    private readonly heuristic: HeuristicGapIdentifier,
    private readonly completion: CompletionCapability,
    private readonly options: AssistedOptions,
    private readonly logger: Logger
  ) {}

  async identify(text: string): Promise<GapReport> {
    const base = this.heuristic.identify(text);

    return withDegradation<GapReport>(
      'gaps',
      this.logger,
      async () => {
        const prompt = buildGapPrompt(textWindow(text, this.options.windowChars));
        const modelNarrative = await requestCompletion(this.completion, prompt, GAPS_MAX_TOKENS, this.options.timeoutMs);

        return {
          ...base,
          modelNarrative,
          confidence: base.limitationSentences.length > 0 ? GAP_CONFIDENCE.assisted.found : GAP_CONFIDENCE.assisted.none,
          strategy: 'assisted'
        };
      },
      (reason) => ({ ...base, degradedReason: reason })
    );
  }
}
