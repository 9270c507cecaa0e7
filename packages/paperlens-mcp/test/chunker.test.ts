import { describe, expect, it } from 'vitest';
import { splitIntoChunks } from '../src/analysis/chunker.js';

// Seeded generator so every run sees the same inputs.
const mulberry32 = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

const pick = <T>(random: () => number, items: readonly T[]): T => {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty list.');
  }
  return item;
};

const words = Array.from({ length: 10 }, (_, index) => `w${index}`).join(' ');

describe('splitIntoChunks', () => {
  it('produces overlapping word windows that end on word boundaries', () => {
    const chunks = splitIntoChunks(words, { chunkSize: 4, overlap: 1, minChunkLength: 0 });

    expect(chunks.map((chunk) => chunk.text)).toEqual(['w0 w1 w2 w3', 'w3 w4 w5 w6', 'w6 w7 w8 w9']);
    expect(chunks.map((chunk) => [chunk.wordStart, chunk.wordEnd])).toEqual([
      [0, 4],
      [3, 7],
      [6, 10]
    ]);
    expect(chunks[1]).toMatchObject({ index: 1, startOffset: 9, endOffset: 20 });
  });

  it('maps offsets back onto the source text', () => {
    const text = '  Alpha beta\n\ngamma   delta ';
    const chunks = splitIntoChunks(text, { chunkSize: 3, overlap: 0, minChunkLength: 0 });

    expect(chunks.map((chunk) => text.slice(chunk.startOffset, chunk.endOffset))).toEqual(['Alpha beta\n\ngamma', 'delta']);
  });

  it('drops short trailing chunks but always keeps the first', () => {
    expect(splitIntoChunks(words, { chunkSize: 4, overlap: 1, minChunkLength: 12 }).map((chunk) => chunk.text)).toEqual([
      'w0 w1 w2 w3'
    ]);
    expect(splitIntoChunks('tiny', { chunkSize: 4, overlap: 1, minChunkLength: 50 })).toHaveLength(1);
  });

  it('returns no chunks for blank text', () => {
    expect(splitIntoChunks('   \n ')).toEqual([]);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => splitIntoChunks(words, { chunkSize: 3, overlap: 3, minChunkLength: 0 })).toThrow(RangeError);
    expect(() => splitIntoChunks(words, { chunkSize: 0, overlap: 0, minChunkLength: 0 })).toThrow(
      'Chunk size must be a positive integer, got 0.'
    );
  });

  it('covers every word with exact overlaps across sizes and overlaps', () => {
    const random = mulberry32(7);
    const gaps = [' ', '  ', '\n', '\t', ' \n '];

    for (let chunkSize = 1; chunkSize <= 6; chunkSize += 1) {
      for (let overlap = 0; overlap < chunkSize; overlap += 1) {
        const wordCount = 1 + Math.floor(random() * 30);
        const text = Array.from({ length: wordCount }, (_, index) => `${pick(random, gaps)}t${index}`).join('');

        const chunks = splitIntoChunks(text, { chunkSize, overlap, minChunkLength: 0 });

        expect(chunks[0]?.wordStart).toBe(0);
        expect(chunks[chunks.length - 1]?.wordEnd).toBe(wordCount);
        chunks.forEach((chunk, index) => {
          expect(chunk.index).toBe(index);
          expect(chunk.wordEnd - chunk.wordStart).toBeLessThanOrEqual(chunkSize);
          expect(chunk.text).toBe(text.slice(chunk.startOffset, chunk.endOffset));
          expect(chunk.text).toBe(chunk.text.trim());

          const previous = chunks[index - 1];
          if (previous) {
            expect(chunk.wordStart).toBe(previous.wordEnd - overlap);
          }
        });
      }
    }
  });
});
