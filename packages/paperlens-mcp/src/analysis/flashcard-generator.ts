import { z } from 'zod';
import type { CompletionCapability } from '../capabilities/types.js';
import { CapabilityUnavailableError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { requestCompletion, withDegradation, type AssistedOptions } from './assisted.js';
import { HeuristicGapIdentifier } from './gap-identifier.js';
import { getPatternLibrary, splitSentences, stripLeadingFunctionWords, type PatternLibrary } from './patterns.js';
import { parseEmbeddedJson, textWindow } from './text-utils.js';
import type { Flashcard, FlashcardReport } from './types.js';

export const DEFAULT_FLASHCARD_COUNT = 8;
export const MAX_FLASHCARD_COUNT = 20;

const MIN_QUESTION_LENGTH = 5;
const MIN_ANSWER_LENGTH = 10;
const PROMPT_WORDS = 4;
const FLASHCARDS_MAX_TOKENS = 1200;

// "Transformers are a family of ..." -> subject, copula, predicate
const DEFINITION_SENTENCE = /^(.{3,60}?)\s+(is|are)\s+((?:a|an|the)\s+.+)$/;

const flashcardListSchema = z.array(
  z.object({
    question: z.string(),
    answer: z.string()
  })
);

type CardDraft = Omit<Flashcard, 'id'>;

export interface FlashcardStrategy {
  generate(text: string, numCards?: number): FlashcardReport | Promise<FlashcardReport>;
}

const capitalize = (value: string): string => `${value.charAt(0).toUpperCase()}${value.slice(1)}`;

const numbered = (drafts: CardDraft[], numCards: number): Flashcard[] =>
  drafts.slice(0, numCards).map((draft, index) => ({ id: index + 1, ...draft }));

/**
 * Question and answer cards built from the document's own sentences: "X is a Y" definitions first,
 * then limitation sentences as completion prompts.
 */
export class HeuristicFlashcardGenerator implements FlashcardStrategy {
  private readonly gaps: HeuristicGapIdentifier;

  constructor(private readonly patterns: PatternLibrary = getPatternLibrary()) {
    this.gaps = new HeuristicGapIdentifier(patterns);
  }

  definitionCards(text: string): CardDraft[] {
    const seen = new Set<string>();
    const cards: CardDraft[] = [];

    for (const sentence of splitSentences(this.patterns, text).map((fragment) => fragment.trim())) {
      const match = DEFINITION_SENTENCE.exec(sentence);
      if (!match) {
        continue;
      }

      const [, rawSubject = '', verb = '', predicate = ''] = match;
      const subject = stripLeadingFunctionWords(this.patterns, rawSubject);
      if (subject.length === 0 || seen.has(subject.toLowerCase())) {
        continue;
      }

      seen.add(subject.toLowerCase());
      cards.push({ question: `What ${verb} ${subject}?`, answer: `${capitalize(predicate)}.`, kind: 'definition' });
    }

    return cards;
  }

  limitationCards(text: string): CardDraft[] {
    return this.gaps
      .findGapSentences(text)
      .map((sentence) => sentence.split(/\s+/))
      .filter((words) => words.length > PROMPT_WORDS)
      .map((words): CardDraft => ({
        question: `Complete the statement: "${words.slice(0, PROMPT_WORDS).join(' ')}..."`,
        answer: `${words.join(' ')}.`,
        kind: 'limitation'
      }));
  }

  generate(text: string, numCards: number = DEFAULT_FLASHCARD_COUNT): FlashcardReport {
    const flashcards = numbered([...this.definitionCards(text), ...this.limitationCards(text)], numCards);

    return {
      flashcards,
      totalCards: flashcards.length,
      strategy: 'heuristic',
      degradedReason: null,
      error: null
    };
  }
}

export const buildFlashcardPrompt = (excerptText: string, numCards: number): string => `Write ${numCards} study flashcards about this research paper text.
Respond with a JSON array only, where each item has a "question" and an "answer" field.

Text:
${excerptText}`;

export class AssistedFlashcardGenerator implements FlashcardStrategy {
  constructor(
    private readonly heuristic: HeuristicFlashcardGenerator,
    private readonly completion: CompletionCapability,
    private readonly options: AssistedOptions,
    private readonly logger: Logger
  ) {}

  async generate(text: string, numCards: number = DEFAULT_FLASHCARD_COUNT): Promise<FlashcardReport> {
    const base = this.heuristic.generate(text, numCards);

    return withDegradation<FlashcardReport>(
      'flashcards',
      this.logger,
      async () => {
        const prompt = buildFlashcardPrompt(textWindow(text, this.options.windowChars), numCards);
        const output = await requestCompletion(this.completion, prompt, FLASHCARDS_MAX_TOKENS, this.options.timeoutMs);
        const parsed = flashcardListSchema.safeParse(parseEmbeddedJson(output, 'array'));
        if (!parsed.success) {
          throw new CapabilityUnavailableError('The completion capability returned malformed flashcards.', 'completion');
        }

        const drafts = parsed.data
          .map(({ question, answer }) => ({ question: question.trim(), answer: answer.trim() }))
          .filter(({ question, answer }) => question.length > MIN_QUESTION_LENGTH && answer.length > MIN_ANSWER_LENGTH)
          .map((card): CardDraft => ({ ...card, kind: 'model' }));
        if (drafts.length === 0) {
          throw new CapabilityUnavailableError('The completion capability returned no usable flashcards.', 'completion');
        }

        const flashcards = numbered(drafts, numCards);
        return { ...base, flashcards, totalCards: flashcards.length, strategy: 'assisted' };
      },
      (reason) => ({ ...base, degradedReason: reason })
    );
  }
}
