export interface Token {
  text: string;
  lower: string;
  start: number; // char offset into the source text
  end: number;
}

// "10,000" stays one token; other commas separate.
const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:['’./-][\p{L}\p{N}]+|(?<=\d),\d{3}(?!\d))*/gu;

export function tokenize(text: string, offset = 0): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = (match.index ?? 0) + offset;
    tokens.push({
      text: match[0],
      lower: match[0].toLowerCase().replace(/’/g, "'"),
      start,
      end: start + match[0].length,
    });
  }
  return tokens;
}

export function normalizePhrase(text: string): string {
  return tokenize(text)
    .map((t) => t.lower)
    .join(" ");
}

/**
 * False for blank or punctuation-only text.
 */
export function hasWords(text: string): boolean {
  return tokenize(text).length > 0;
}
