/**
 * Words too common to say anything about what the user is asking
 */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'is', 'are', 'am', 'was', 'be', 'do', 'does', 'did',
  'i', 'me', 'my', 'we', 'our', 'you', 'your', 'it', 'its',
  'what', 'whats', 'how', 'much', 'many', 'which', 'who',
  'to', 'of', 'for', 'in', 'on', 'at', 'by', 'from', 'with', 'and', 'or',
  'can', 'could', 'will', 'would', 'should', 'there', 'this', 'that',
  'please', 'tell', 'about', 'any', 'some',
]);

const MIN_TOKEN_LENGTH = 2;

/**
 * Lowercases, strips punctuation and splits on whitespace, dropping short
 * tokens and stop words. Order of first appearance is kept.
 */
export function tokenize(text: string): string[] {
  const stripped = text.toLowerCase().replace(/[^\p{L}\p{N}\s]/gu, '');
  const seen = new Set<string>();

  for (const token of stripped.split(/\s+/)) {
    if (token.length < MIN_TOKEN_LENGTH || STOP_WORDS.has(token)) {
      continue;
    }
    seen.add(token);
  }

  return [...seen];
}
