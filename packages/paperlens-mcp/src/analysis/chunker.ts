import type { Chunk } from './types.js';

export interface ChunkerOptions {
  chunkSize: number;
  overlap: number;
  /** Trailing chunks with fewer characters than this are dropped; the first chunk is always kept. */
  minChunkLength: number;
}

export const DEFAULT_CHUNKER_OPTIONS: ChunkerOptions = {
  chunkSize: 200,
  overlap: 40,
  minChunkLength: 50
};

interface WordSpan {
  start: number;
  end: number;
}

const wordSpans = (text: string): WordSpan[] =>
  Array.from(text.matchAll(/\S+/g), (match) => {
    const start = match.index ?? 0;
    return { start, end: start + match[0].length };
  });

/**
 * Splits text into windows of at most `chunkSize` words. Each window after the first starts
 * `overlap` words before the previous one ends, and chunk boundaries always fall between words.
 */
export const splitIntoChunks = (text: string, options: ChunkerOptions = DEFAULT_CHUNKER_OPTIONS): Chunk[] => {
  const { chunkSize, overlap, minChunkLength } = options;

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}.`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(`Chunk overlap must be an integer in [0, ${chunkSize}), got ${overlap}.`);
  }

  const words = wordSpans(text);
  const step = chunkSize - overlap;
  const chunks: Chunk[] = [];

  for (let wordStart = 0; wordStart < words.length; wordStart += step) {
    const wordEnd = Math.min(wordStart + chunkSize, words.length);
    const first = words[wordStart];
    const last = words[wordEnd - 1];
    if (!first || !last) {
      break;
    }

    chunks.push({
      index: chunks.length,
      text: text.slice(first.start, last.end),
      startOffset: first.start,
      endOffset: last.end,
      wordStart,
      wordEnd
    });

    if (wordEnd === words.length) {
      break;
    }
  }

  while (chunks.length > 1 && (chunks[chunks.length - 1]?.text.length ?? 0) < minChunkLength) {
    chunks.pop();
  }

  return chunks;
};
