const WORD_NUMBERS = new Map<string, number>([
  ["zero", 0],
  ["one", 1],
  ["two", 2],
  ["three", 3],
  ["four", 4],
  ["five", 5],
  ["six", 6],
  ["seven", 7],
  ["eight", 8],
  ["nine", 9],
  ["ten", 10],
  ["eleven", 11],
  ["twelve", 12],
  ["thirteen", 13],
  ["fourteen", 14],
  ["fifteen", 15],
  ["sixteen", 16],
  ["seventeen", 17],
  ["eighteen", 18],
  ["nineteen", 19],
  ["twenty", 20],
]);

const DECIMAL = /^(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$/;
const FRACTION = /^(\d+)\/(\d+)$/;

/**
 * Reads one token as a number: digits (with or without thousands separators),
 * decimals, "3/4", or one to twenty spelled out.
 */
export function parseNumberWord(word: string): number | undefined {
  const lower = word.toLowerCase();
  if (DECIMAL.test(lower)) return Number(lower.replace(/,/g, ""));

  const fraction = FRACTION.exec(lower);
  if (fraction) {
    const denominator = Number(fraction[2]);
    if (denominator === 0) return undefined;
    return Number(fraction[1]) / denominator;
  }

  return WORD_NUMBERS.get(lower);
}

export function isNumberWord(word: string): boolean {
  return parseNumberWord(word) !== undefined;
}
