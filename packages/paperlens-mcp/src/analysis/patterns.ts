import { readFileSync } from 'node:fs';
import { z } from 'zod';

export type CitationKind = 'numeric' | 'parenthetical' | 'narrative';

export interface CitationPattern {
  kind: CitationKind;
  pattern: RegExp;
}

export interface GapCategoryRule {
  keyword: string;
  category: string;
}

/**
 * Shared regular expressions and keyword sets. Every analyzer reads its notion of a
 * citation, a concept or a limitation from here, in both its heuristic and assisted form.
 */
export interface PatternLibrary {
  citationPatterns: readonly CitationPattern[];
  year: RegExp;
  authorYear: RegExp;
  sentenceTerminators: RegExp;
  properNounPhrase: RegExp;
  acronym: RegExp;
  technicalTerm: RegExp;
  designCategories: ReadonlyMap<string, readonly string[]>;
  methodKeywords: readonly string[];
  techniques: readonly string[];
  gapIndicators: readonly string[];
  gapCategories: readonly GapCategoryRule[];
  functionWords: ReadonlySet<string>;
}

const patternDataSchema = z.object({
  designCategories: z.record(z.string(), z.array(z.string().min(1)).min(1)),
  methodKeywords: z.array(z.string().min(1)),
  techniques: z.array(z.string().min(1)),
  gapIndicators: z.array(z.string().min(1)),
  gapCategories: z.array(z.object({ keyword: z.string().min(1), category: z.string().min(1) })),
  functionWords: z.array(z.string().min(1)),
  technicalTermStems: z.array(z.string().regex(/^[a-z]+$/)).min(1)
});

export type PatternData = z.infer<typeof patternDataSchema>;

const DEFAULT_DATA_URL = new URL('../../data/pattern-library.json', import.meta.url);

// "algorithm" -> "[Aa]lgorithm", so both sentence-initial and inline forms match.
const stemAlternative = (stem: string): string => `[${stem.charAt(0).toUpperCase()}${stem.charAt(0)}]${stem.slice(1)}`;

export const buildPatternLibrary = (parsed: PatternData): PatternLibrary => ({
  citationPatterns: [
    { kind: 'numeric', pattern: /\[(\d+)\]/g },
    { kind: 'parenthetical', pattern: /\(([^)]+\d{4}[^)]*)\)/g },
    { kind: 'narrative', pattern: /([A-Z][a-z]+ et al\.?, \d{4})/g }
  ],
  year: /\b(?:19|20)\d{2}\b/g,
  authorYear: /\b([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*),?\s+(?:et\s+al\.?,?\s+)?\(?((?:19|20)\d{2})\b/g,
  sentenceTerminators: /[.!?]+/,
  properNounPhrase: /\b[A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)*\b/g,
  acronym: /\b[A-Z]{2,}\b/g,
  technicalTerm: new RegExp(`\\b\\w*(?:${parsed.technicalTermStems.map(stemAlternative).join('|')})\\w*\\b`, 'g'),
  designCategories: new Map(Object.entries(parsed.designCategories)),
  methodKeywords: parsed.methodKeywords,
  techniques: parsed.techniques,
  gapIndicators: parsed.gapIndicators,
  gapCategories: parsed.gapCategories,
  functionWords: new Set(parsed.functionWords)
});

export const loadPatternLibrary = (source: URL | string = DEFAULT_DATA_URL): PatternLibrary => {
  const raw: unknown = JSON.parse(readFileSync(source, 'utf8'));
  return buildPatternLibrary(patternDataSchema.parse(raw));
};

let defaultLibrary: PatternLibrary | undefined;

export const getPatternLibrary = (): PatternLibrary => {
  defaultLibrary ??= loadPatternLibrary();
  return defaultLibrary;
};

export interface PatternMatch {
  text: string;
  index: number;
  groups: string[];
}

/** Global-flag patterns carry lastIndex state, so every scan runs on a fresh copy. */
export const findMatches = (pattern: RegExp, text: string): PatternMatch[] => {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;

  return Array.from(text.matchAll(new RegExp(pattern.source, flags)), (match) => ({
    text: match[0],
    index: match.index ?? 0,
    groups: match.slice(1).map((group) => group ?? '')
  }));
};

/** Sentence fragments in document order, untrimmed; empty fragments are kept so positions stay stable. */
export const splitSentences = (library: PatternLibrary, text: string): string[] => text.split(library.sentenceTerminators);

export const containsAny = (lowerText: string, needles: readonly string[]): boolean =>
  needles.some((needle) => lowerText.includes(needle.toLowerCase()));

export const stripLeadingFunctionWords = (library: PatternLibrary, phrase: string): string => {
  const words = phrase.split(/\s+/).filter((word) => word.length > 0);
  let start = 0;

  while (start < words.length && library.functionWords.has(words[start] ?? '')) {
    start += 1;
  }

  return words.slice(start).join(' ');
};
