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
import { parseEmbeddedJson, textWindow } from './text-utils.js';
import type { ConceptEdge, ConceptGraph } from './types.js';

export const MAX_CONCEPTS = 20;
export const HEURISTIC_SENTENCE_LIMIT = 20;

const MIN_CONCEPT_LENGTH = 3;
const MAX_CONCEPT_LENGTH = 30;
const ENTITY_MAX_TOKENS = 600;
const MIN_JSON_OUTPUT_LENGTH = 2;
const ENTITY_TYPES = new Set(['PERSON', 'ORG', 'PRODUCT', 'EVENT']);

const entityListSchema = z.array(
  z.object({
    text: z.string(),
    type: z.string()
  })
);

export interface ConceptCandidate {
  text: string;
  index: number;
}

export interface ConceptGraphStrategy {
  build(text: string): ConceptGraph | Promise<ConceptGraph>;
}

/**
 * Assembles the graph from candidate surface strings: first-appearance order, filtered, capped,
 * then linked when two concepts share a sentence (case-insensitive).
 */
export const assembleConceptGraph = (
  patterns: PatternLibrary,
  text: string,
  candidates: ConceptCandidate[],
  sentenceLimit: number | null
): Pick<ConceptGraph, 'nodes' | 'edges' | 'stats'> => {
  const concepts: string[] = [];
  const ordered = [...candidates].sort((left, right) => left.index - right.index);

  for (const candidate of ordered) {
    const concept = stripLeadingFunctionWords(patterns, candidate.text);
    if (
      concept.length < MIN_CONCEPT_LENGTH ||
      concept.length > MAX_CONCEPT_LENGTH ||
      patterns.functionWords.has(concept) ||
      concepts.includes(concept)
    ) {
      continue;
    }

    concepts.push(concept);
    if (concepts.length === MAX_CONCEPTS) {
      break;
    }
  }

  const fragments = splitSentences(patterns, text);
  const sentences = (sentenceLimit === null ? fragments : fragments.slice(0, sentenceLimit)).map((sentence) =>
    sentence.toLowerCase()
  );
  const lowered = concepts.map((concept) => concept.toLowerCase());

  const edges: ConceptEdge[] = [];
  for (let i = 0; i < concepts.length; i += 1) {
    for (let j = i + 1; j < concepts.length; j += 1) {
      const left = lowered[i] ?? '';
      const right = lowered[j] ?? '';
      const source = concepts[i];
      const target = concepts[j];
      if (source && target && sentences.some((sentence) => sentence.includes(left) && sentence.includes(right))) {
        edges.push({ source, target });
      }
    }
  }

  return {
    nodes: concepts.map((concept) => ({ id: concept, label: concept })),
    edges,
    stats: {
      totalConcepts: concepts.length,
      totalConnections: edges.length
    }
  };
};

export const patternCandidates = (patterns: PatternLibrary, text: string): ConceptCandidate[] =>
  [...findMatches(patterns.properNounPhrase, text), ...findMatches(patterns.acronym, text)].map((match) => ({
    text: match.text,
    index: match.index
  }));

/** Proper-noun phrases and acronyms, edges from the first sentences only. */
export class HeuristicConceptGraphBuilder implements ConceptGraphStrategy {
  constructor(private readonly patterns: PatternLibrary = getPatternLibrary()) {}

  build(text: string): ConceptGraph {
    return {
      ...assembleConceptGraph(this.patterns, text, patternCandidates(this.patterns, text), HEURISTIC_SENTENCE_LIMIT),
      strategy: 'heuristic',
      degradedReason: null,
      error: null
    };
  }
}

export const buildEntityPrompt = (excerpt: string): string => `List the named entities in the research paper text below.
Only include people, organizations, products and events.
Respond with a JSON array only, in the form [{"text": "...", "type": "PERSON|ORG|PRODUCT|EVENT"}].

Text:
${excerpt}`;

/** Parses the entity list out of model output, keeping supported types that actually occur in the text. */
export const parseEntityCandidates = (output: string, text: string): ConceptCandidate[] => {
  const parsed = entityListSchema.safeParse(parseEmbeddedJson(output, 'array'));
  if (!parsed.success) {
    throw new CapabilityUnavailableError('The completion capability returned a malformed entity list.', 'completion');
  }

  return parsed.data
    .filter((entity) => ENTITY_TYPES.has(entity.type.trim().toUpperCase()))
    .map((entity) => ({ text: entity.text.trim(), index: text.indexOf(entity.text.trim()) }))
    .filter((candidate) => candidate.text.length > 0 && candidate.index >= 0);
};

/** Adds model-recognised entities to the pattern candidates and scans every sentence for co-occurrence. */
export class AssistedConceptGraphBuilder implements ConceptGraphStrategy {
  constructor(
    private readonly heuristic: HeuristicConceptGraphBuilder,
    private readonly completion: CompletionCapability,
    private readonly options: AssistedOptions,
    private readonly logger: Logger,
    private readonly patterns: PatternLibrary = getPatternLibrary()
  ) {}

  async build(text: string): Promise<ConceptGraph> {
    return withDegradation<ConceptGraph>(
      'concept-map',
      this.logger,
      async () => {
        const prompt = buildEntityPrompt(textWindow(text, this.options.windowChars));
        const output = await requestCompletion(
          this.completion,
          prompt,
          ENTITY_MAX_TOKENS,
          this.options.timeoutMs,
          MIN_JSON_OUTPUT_LENGTH
        );
        const candidates = [...patternCandidates(this.patterns, text), ...parseEntityCandidates(output, text)];

        return {
          ...assembleConceptGraph(this.patterns, text, candidates, null),
          strategy: 'assisted',
          degradedReason: null,
          error: null
        };
      },
      (reason) => ({ ...this.heuristic.build(text), degradedReason: reason })
    );
  }
}
