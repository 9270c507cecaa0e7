// Character rules run before line rules, so a line emptied by URL or email
// removal is dropped in the same pass.

const LINE_BREAKS = /\r\n?/g;
const CONTROL_CHARACTERS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x84\x86-\x9F]/g;
const DOUBLE_QUOTES = /[\u201C\u201D\u201E\u201F]/g;
const SINGLE_QUOTES = /[\u2018\u2019\u201A\u201B]/g;
const URLS = /\b(?:https?|ftp):\/\/\S+|\bwww\.\S+/gi;
const EMAILS = /\S+@\S+\.\S+/g;
const DOT_RUNS = /\.{3,}/g;
const DASH_RUNS = /-{3,}/g;
const INLINE_SPACE = /[ \t\u00A0]+/g;
const PAGE_NUMBER_LINE = /^(?:page\s+)?\d{1,4}(?:\s*(?:\/|of)\s*\d{1,4})?$/i;
const BLANK_LINE_RUNS = /\n{3,}/g;

const stripBoilerplateLines = (lines: string[]): string[] =>
  lines.filter((line) => !PAGE_NUMBER_LINE.test(line));

export const normalizeText = (text: string): string => {
  const characters = text
    .replace(LINE_BREAKS, '\n')
    .replace(CONTROL_CHARACTERS, '')
    .replace(DOUBLE_QUOTES, '"')
    .replace(SINGLE_QUOTES, "'")
    .replace(URLS, '')
    .replace(EMAILS, '')
    .replace(DOT_RUNS, '...')
    .replace(DASH_RUNS, '---');

  const lines = characters.split('\n').map((line) => line.replace(INLINE_SPACE, ' ').trim());

  return stripBoilerplateLines(lines).join('\n').replace(BLANK_LINE_RUNS, '\n\n').trim();
};
