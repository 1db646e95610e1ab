import { tokenize } from './tokenizer';
import { KnowledgeBaseIndex, MatchResult } from './kb.types';

/**
 * Scores every entry by keyword overlap with the query and returns the best.
 * Only a strictly higher score replaces the current best, so among equal
 * scores the first entry in build order wins.
 */
export function match(query: string, index: KnowledgeBaseIndex): MatchResult {
  const tokens = tokenize(query);
  let best: MatchResult = { kind: 'no_match' };
  let bestScore = 0;

  for (const entry of index.entries) {
    let score = 0;
    for (const token of tokens) {
      if (entry.keywords.has(token)) {
        score += 1;
      }
    }
    if (score > bestScore) {
      bestScore = score;
      best = { kind: 'answer', entry, score };
    }
  }

  return best;
}
