/**
 * Numeric scale factors implied by free text ("per 1000", "percent", ...).
 *
 * Best effort, English and French only.
 */

const MAGNITUDE_WORDS: ReadonlyMap<string, number> = new Map([
  ['ten', 10],
  ['hundred', 100],
  ['thousand', 1_000],
  ['million', 1_000_000],
  ['billion', 1_000_000_000],
  ['percent', 100],
]);

// "per 1000", "pour 100", "par 10", "*100", "/1000", or "100*"
const MULTIPLICATIVE_PATTERN = /(?:pour|per|par|[*/])(\d+)|(\d+)\*/i;

const BARE_NUMBER_PATTERN = /(\d+)/;

/**
 * Extracts a scale factor from `text`.
 *
 * With `multiplicative`, only numbers introduced by per/pour/par, `*` or `/`,
 * or followed by `*`, count; otherwise the first integer does. Whitespace and
 * thousands separators are ignored. Without a number, magnitude words are
 * multiplied together ("ten thousand" → 10000).
 */
export const extractNumericFactor = (text: string, multiplicative: boolean): number | null => {
  const compact = text.replace(/[\s,]/g, '');
  const numberMatch = (multiplicative ? MULTIPLICATIVE_PATTERN : BARE_NUMBER_PATTERN).exec(
    compact
  );
  if (numberMatch !== null) {
    const digits = numberMatch[1] ?? numberMatch[2];
    if (digits !== undefined) {
      return Number.parseInt(digits, 10);
    }
  }

  return extractMagnitude(text);
};

/**
 * Product of every magnitude word in `text`, or null when there is none.
 * Words are delimited by whitespace, hyphens or the string edges.
 */
export const extractMagnitude = (text: string): number | null => {
  let factor: number | null = null;

  for (const word of text.toLowerCase().split(/[\s-]+/)) {
    const magnitude = MAGNITUDE_WORDS.get(word);
    if (magnitude !== undefined) {
      factor = (factor ?? 1) * magnitude;
    }
  }

  return factor;
};
