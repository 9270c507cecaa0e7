import type { CompletionCapability } from '../capabilities/types.js';
import type { Logger } from '../core/logger.js';
import { requestCompletion, withDegradation, type AssistedOptions } from './assisted.js';
import { getPatternLibrary, splitSentences, type PatternLibrary } from './patterns.js';
import { textWindow } from './text-utils.js';
import type { SummaryReport } from './types.js';

const MIN_SUMMARY_SENTENCE_LENGTH = 40;
const SHORT_SUMMARY_SENTENCES = 3;
const DETAILED_SUMMARY_SENTENCES = 8;
const FALLBACK_SUMMARY_CHARS = 300;
const SHORT_SUMMARY_MAX_TOKENS = 150;
const DETAILED_SUMMARY_MAX_TOKENS = 400;

export interface SummaryStrategy {
  summarize(text: string): SummaryReport | Promise<SummaryReport>;
}

const joinSentences = (sentences: string[]): string => sentences.map((sentence) => `${sentence}.`).join(' ');

/** Extractive summary: the leading substantial sentences of the document, in order. */
export class HeuristicSummarizer implements SummaryStrategy {
  constructor(private readonly patterns: PatternLibrary = getPatternLibrary()) {}

  substantialSentences(text: string): string[] {
    return splitSentences(this.patterns, text)
      .map((fragment) => fragment.trim())
      .filter((sentence) => sentence.length >= MIN_SUMMARY_SENTENCE_LENGTH);
  }

  summarize(text: string): SummaryReport {
    const sentences = this.substantialSentences(text);

    if (sentences.length === 0) {
      const excerpt = textWindow(text.trim(), FALLBACK_SUMMARY_CHARS);
      return { shortSummary: excerpt, detailedSummary: excerpt, strategy: 'heuristic', degradedReason: null, error: null };
    }

    return {
      shortSummary: joinSentences(sentences.slice(0, SHORT_SUMMARY_SENTENCES)),
      detailedSummary: joinSentences(sentences.slice(0, DETAILED_SUMMARY_SENTENCES)),
      strategy: 'heuristic',
      degradedReason: null,
      error: null
    };
  }
}

export const buildShortSummaryPrompt = (excerptText: string): string => `Summarize this research paper text in two or three sentences for a general reader.

Text:
${excerptText}`;

export const buildDetailedSummaryPrompt = (excerptText: string): string => `Write a detailed summary of this research paper text covering:

1. The research question
2. The methodology
3. The main findings
4. The conclusions and limitations

Text:
${excerptText}`;

export class AssistedSummarizer implements SummaryStrategy {
  constructor(
    private readonly heuristic: HeuristicSummarizer,
    private readonly completion: CompletionCapability,
    private readonly options: AssistedOptions,
    private readonly logger: Logger
  ) {}

  async summarize(text: string): Promise<SummaryReport> {
    const base = this.heuristic.summarize(text);
    const excerptText = textWindow(text, this.options.windowChars);

    return withDegradation<SummaryReport>(
      'summary',
      this.logger,
      async () => {
        const [shortSummary, detailedSummary] = await Promise.all([
          requestCompletion(this.completion, buildShortSummaryPrompt(excerptText), SHORT_SUMMARY_MAX_TOKENS, this.options.timeoutMs),
          requestCompletion(
            this.completion,
            buildDetailedSummaryPrompt(excerptText),
            DETAILED_SUMMARY_MAX_TOKENS,
            this.options.timeoutMs
          )
        ]);

        return { ...base, shortSummary, detailedSummary, strategy: 'assisted' };
      },
      (reason) => ({ ...base, degradedReason: reason })
    );
  }
}
