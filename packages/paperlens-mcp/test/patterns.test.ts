import { describe, expect, it } from 'vitest';
import {
  buildPatternLibrary,
  findMatches,
  getPatternLibrary,
  splitSentences,
  stripLeadingFunctionWords
} from '../src/analysis/patterns.js';

const library = getPatternLibrary();

describe('pattern library', () => {
  it('loads the bundled keyword data', () => {
    expect([...library.designCategories.keys()]).toEqual(['experimental', 'observational', 'theoretical', 'computational']);
    expect(library.functionWords.has('The')).toBe(true);
    expect(getPatternLibrary()).toBe(library);
  });

  it('matches technical terms in either case', () => {
    expect(findMatches(library.technicalTerm, 'Algorithms beat the baseline model in networked settings.').map((match) => match.text)).toEqual([
      'Algorithms',
      'model',
      'networked'
    ]);
  });

  it('scans with fresh state on every call', () => {
    const text = 'Published in 2019 and revised in 2020.';
    expect(findMatches(library.year, text).map((match) => match.text)).toEqual(['2019', '2020']);
    expect(findMatches(library.year, text).map((match) => match.index)).toEqual([13, 33]);
  });

  it('strips leading function words from a phrase', () => {
    expect(stripLeadingFunctionWords(library, 'In The Graph Model')).toBe('Graph Model');
    expect(stripLeadingFunctionWords(library, 'The')).toBe('');
  });

  it('keeps empty sentence fragments', () => {
    expect(splitSentences(library, 'One. Two?! Three')).toEqual(['One', ' Two', ' Three']);
    expect(splitSentences(library, 'End.')).toEqual(['End', '']);
  });

  it('builds regular expressions from custom stems', () => {
    const custom = buildPatternLibrary({
      designCategories: { qualitative: ['interview'] },
      methodKeywords: [],
      techniques: [],
      gapIndicators: [],
      gapCategories: [],
      functionWords: [],
      technicalTermStems: ['graph']
    });

    expect(findMatches(custom.technicalTerm, 'Graphs and subgraphs').map((match) => match.text)).toEqual(['Graphs', 'subgraphs']);
  });
});
