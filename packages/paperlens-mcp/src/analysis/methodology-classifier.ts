import type { CompletionCapability } from '../capabilities/types.js';
import type { Logger } from '../core/logger.js';
import { requestCompletion, withDegradation, type AssistedOptions } from './assisted.js';
import { containsAny, getPatternLibrary, type PatternLibrary } from './patterns.js';
import { textWindow } from './text-utils.js';
import type { MethodologyReport } from './types.js';

export const HEURISTIC_METHODOLOGY_CONFIDENCE = 0.7;
export const ASSISTED_METHODOLOGY_CONFIDENCE = 0.85;

const MAX_RESEARCH_METHODS = 10;
const NARRATIVE_METHODS = 5;
const METHODOLOGY_MAX_TOKENS = 1000;

export interface MethodologyStrategy {
  classify(text: string): MethodologyReport | Promise<MethodologyReport>;
}

const dataCollectionStyle = (lower: string): string => {
  if (containsAny(lower, ['survey', 'questionnaire'])) {
    return 'Survey/Questionnaire based';
  }
  if (containsAny(lower, ['experiment', 'algorithm'])) {
    return 'Experimental/Computational';
  }
  return 'Mixed methods';
};

const toolingStyle = (lower: string): string => {
  if (containsAny(lower, ['machine learning', 'neural']) || /\bai\b/.test(lower)) {
    return 'Machine Learning/AI';
  }
  if (containsAny(lower, ['statistical', 'regression'])) {
    return 'Statistical Analysis';
  }
  return 'General computational tools';
};

const sampleStyle = (lower: string): string =>
  containsAny(lower, ['large', 'big data', 'dataset']) ? 'Large scale' : 'Standard sample size';

export class HeuristicMethodologyClassifier implements MethodologyStrategy {
  constructor(private readonly patterns: PatternLibrary = getPatternLibrary()) {}

  classify(text: string): MethodologyReport {
    const lower = text.toLowerCase();

    const designCategories = [...this.patterns.designCategories.entries()]
      .filter(([, keywords]) => containsAny(lower, keywords))
      .map(([category]) => category);
    const researchMethods = this.patterns.methodKeywords
      .filter((keyword) => lower.includes(keyword.toLowerCase()))
      .slice(0, MAX_RESEARCH_METHODS);
    const techniques = this.patterns.techniques.filter((technique) => lower.includes(technique.toLowerCase()));

    const narrative = [
      `Research Design: ${designCategories.length > 0 ? designCategories.join(', ') : 'Not clearly identified'}`,
      `Data Collection Methods: ${dataCollectionStyle(lower)}`,
      `Analysis Techniques: ${
        researchMethods.length > 0 ? researchMethods.slice(0, NARRATIVE_METHODS).join(', ') : 'Standard analytical methods'
      }`,
      `Tools and Technologies: ${toolingStyle(lower)}`,
      `Sample Size: ${sampleStyle(lower)}`
    ].join('\n\n');

    return {
      designCategories,
      researchMethods,
      techniques,
      narrative,
      modelNarrative: null,
      confidence: HEURISTIC_METHODOLOGY_CONFIDENCE,
      strategy: 'heuristic',
      degradedReason: null,
      error: null
    };
  }
}

export const buildMethodologyPrompt = (excerpt: string): string => `Analyze the following research paper text and describe its methodology under these headings:

1. Research Design (experimental, observational, theoretical, computational, etc.)
2. Data Collection Methods
3. Analysis Techniques
4. Tools and Technologies Used
5. Sample Size and Population
6. Variables and Measurements

Text:
${excerpt}`;

/** Heuristic classification plus a model-written breakdown; keeps the heuristic report when the model is unavailable. */
export class AssistedMethodologyClassifier implements MethodologyStrategy {
  constructor(
    private readonly heuristic: HeuristicMethodologyClassifier,
    private readonly completion: CompletionCapability,
    private readonly options: AssistedOptions,
    private readonly logger: Logger
  ) {}

  async classify(text: string): Promise<MethodologyReport> {
    const base = this.heuristic.classify(text);

    return withDegradation<MethodologyReport>(
      'methodology',
      this.logger,
      async () => {
        const prompt = buildMethodologyPrompt(textWindow(text, this.options.windowChars));
        const modelNarrative = await requestCompletion(this.completion, prompt, METHODOLOGY_MAX_TOKENS, this.options.timeoutMs);

        return {
          ...base,
          modelNarrative,
          confidence: ASSISTED_METHODOLOGY_CONFIDENCE,
          strategy: 'assisted'
        };
      },
      (reason) => ({ ...base, degradedReason: reason })
    );
  }
}
