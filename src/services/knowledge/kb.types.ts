export type KnowledgeCategory =
  | 'fares'
  | 'dates'
  | 'return_service'
  | 'luggage'
  | 'locations'
  | 'booking'
  | 'faq';

export interface KnowledgeEntry {
  keywords: ReadonlySet<string>;
  answer: string;
  category: KnowledgeCategory | null;
}

/**
 * Entries in build order. Build order is the tie-break between equal scores.
 */
export interface KnowledgeBaseIndex {
  readonly entries: readonly KnowledgeEntry[];
}

export type MatchResult =
  | { kind: 'answer'; entry: KnowledgeEntry; score: number }
  | { kind: 'no_match' };
