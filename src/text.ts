// Leading/trailing punctuation around a whitespace token ("LED?" -> "led")
const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/** Whitespace tokenization, lower-cased, edge punctuation trimmed, empties dropped. */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const raw of text.toLowerCase().split(/\s+/)) {
    const token = raw.replace(EDGE_PUNCTUATION, "");
    if (token) tokens.push(token);
  }
  return tokens;
}

/** Rough token estimate (~4 chars per token). */
export function estimateTokens(text: string): number {
  return text.length / 4;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}
