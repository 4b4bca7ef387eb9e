import type { CorpusRecord, ScoredRecord } from '../core/types.js';
import type { Scorer } from './scorer.js';

/** Lower-cased, whitespace-split, de-duplicated query tokens in first-seen order. */
export function tokenizeQuery(query: string): string[] {
  const tokens = query
    .toLowerCase()
    .split(/\s+/)
    .filter((t) => t.length > 0);
  return [...new Set(tokens)];
}

/**
 * Counts the distinct query tokens found anywhere in a record's lower-cased text.
 *
 * Matching is plain substring containment, so `ph` also matches inside `phase`.
 */
export class KeywordOverlapScorer implements Scorer {
  readonly id = 'keyword-overlap';

  score(query: string, corpus: readonly CorpusRecord[]): ScoredRecord[] {
    const tokens = tokenizeQuery(query);
    if (tokens.length === 0) return [];

    const out: ScoredRecord[] = [];
    for (const record of corpus) {
      const haystack = record.text.toLowerCase();
      let score = 0;
      for (const token of tokens) {
        if (haystack.includes(token)) score++;
      }
      if (score > 0) out.push({ recordId: record.id, text: record.text, score });
    }
    return out;
  }
}
