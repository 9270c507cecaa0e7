const WORD = /\S+/g;

export const countWords = (text: string): number => text.match(WORD)?.length ?? 0;

export const textWindow = (text: string, maxChars: number): string => (text.length > maxChars ? text.slice(0, maxChars) : text);

/** Mean rounded to two decimals; 0 for an empty list. */
export const roundedMean = (values: number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  const sum = values.reduce((total, value) => total + value, 0);
  return Math.round((sum / values.length) * 100) / 100;
};

/**
 * Pulls the outermost JSON array or object out of free-form model output, which often wraps it
 * in prose or a fenced code block. Returns undefined when nothing parses.
 */
export const parseEmbeddedJson = (output: string, shape: 'array' | 'object'): unknown => {
  const [open, close] = shape === 'array' ? ['[', ']'] : ['{', '}'];
  const start = output.indexOf(open);
  const end = output.lastIndexOf(close);

  if (start < 0 || end <= start) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(output.slice(start, end + 1));
    return parsed;
  } catch {
    return undefined;
  }
};
