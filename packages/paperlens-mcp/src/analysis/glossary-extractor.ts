import { z } from 'zod';
import type { CompletionCapability } from '../capabilities/types.js';
import { CapabilityUnavailableError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { requestCompletion, withDegradation, type AssistedOptions } from './assisted.js';
import {
  findMatches,
  getPatternLibrary,
  splitSentences,
  stripLeadingFunctionWords,
  type PatternLibrary
} from './patterns.js';
import { parseEmbeddedJson } from './text-utils.js';
import type { GlossaryEntry, GlossaryReport } from './types.js';

export const DEFAULT_MAX_TERMS = 15;

const MIN_TERM_LENGTH = 3;
const MAX_TERM_LENGTH = 30;
const MIN_DEFINITION_LENGTH = 10;
const GLOSSARY_MAX_TOKENS = 1200;

const definitionMapSchema = z.record(z.string(), z.string());

export interface GlossaryStrategy {
  extract(text: string, maxTerms: number): GlossaryReport | Promise<GlossaryReport>;
}

/** Acronyms, capitalized phrases and algorithm/model/network/learning words, in order of first use. */
export const extractTechnicalTerms = (patterns: PatternLibrary, text: string, maxTerms: number): string[] => {
  const matches = [
    ...findMatches(patterns.acronym, text),
    ...findMatches(patterns.properNounPhrase, text),
    ...findMatches(patterns.technicalTerm, text)
  ].sort((left, right) => left.index - right.index);

  const terms: string[] = [];
  for (const match of matches) {
    if (terms.length >= maxTerms) {
      break;
    }

    const term = stripLeadingFunctionWords(patterns, match.text);
    if (
      term.length >= MIN_TERM_LENGTH &&
      term.length < MAX_TERM_LENGTH &&
      !/^\d+$/.test(term) &&
      !patterns.functionWords.has(term) &&
      !terms.includes(term)
    ) {
      terms.push(term);
    }
  }

  return terms;
};

/** Drops a repeated leading term and a dangling separator, and capitalizes the first letter. */
export const cleanDefinition = (definition: string, term: string): string => {
  let cleaned = definition.trim();

  if (cleaned.toLowerCase().startsWith(term.toLowerCase())) {
    cleaned = cleaned
      .slice(term.length)
      .replace(/^\s*(?::|-|is\b)\s*/i, '')
      .trim();
  }

  return cleaned.length > 0 ? `${cleaned.charAt(0).toUpperCase()}${cleaned.slice(1)}` : cleaned;
};

export class HeuristicGlossaryExtractor implements GlossaryStrategy {
  constructor(private readonly patterns: PatternLibrary = getPatternLibrary()) {}

  contextDefinition(text: string, term: string): string {
    const sentence = splitSentences(this.patterns, text)
      .map((fragment) => fragment.trim())
      .find((fragment) => fragment.includes(term));

    return sentence ? `${sentence}.` : '';
  }

  terms(text: string, maxTerms: number): string[] {
    return extractTechnicalTerms(this.patterns, text, maxTerms);
  }

  extract(text: string, maxTerms: number = DEFAULT_MAX_TERMS): GlossaryReport {
    return {
      terms: this.terms(text, maxTerms).map((term) => ({
        term,
        definition: this.contextDefinition(text, term),
        source: 'context'
      })),
      strategy: 'heuristic',
      degradedReason: null,
      error: null
    };
  }
}

export const buildGlossaryPrompt = (terms: string[]): string => `Define each of the following technical terms from a research paper in one plain-language sentence for a general audience.
Respond with a JSON object only, mapping each term to its definition.

Terms:
${terms.map((term) => `- ${term}`).join('\n')}`;

/** Model-written definitions for every term in one request; terms the model skips keep their context sentence. */
export class AssistedGlossaryExtractor implements GlossaryStrategy {
  constructor(
    private readonly heuristic: HeuristicGlossaryExtractor,
    private readonly completion: CompletionCapability,
    private readonly options: AssistedOptions,
    private readonly logger: Logger
  ) {}

  async extract(text: string, maxTerms: number = DEFAULT_MAX_TERMS): Promise<GlossaryReport> {
    const base = this.heuristic.extract(text, maxTerms);
    if (base.terms.length === 0) {
      return base;
    }

    return withDegradation<GlossaryReport>(
      'glossary',
      this.logger,
      async () => {
        const prompt = buildGlossaryPrompt(base.terms.map((entry) => entry.term));
        const output = await requestCompletion(this.completion, prompt, GLOSSARY_MAX_TOKENS, this.options.timeoutMs);
        const parsed = definitionMapSchema.safeParse(parseEmbeddedJson(output, 'object'));
        if (!parsed.success) {
          throw new CapabilityUnavailableError('The completion capability returned malformed definitions.', 'completion');
        }

        const terms = base.terms.map((entry): GlossaryEntry => {
          const definition = cleanDefinition(parsed.data[entry.term] ?? '', entry.term);
          return definition.length > MIN_DEFINITION_LENGTH ? { term: entry.term, definition, source: 'model' } : entry;
        });

        return { ...base, terms, strategy: 'assisted' };
      },
      (reason) => ({ ...base, degradedReason: reason })
    );
  }
}
