import type { CorpusRecord, ScoredRecord } from '../core/types.js';

/**
 * Relevance scoring collaborator.
 *
 * Implementations return one entry per record with a strictly positive score. A scorer
 * backed by a remote service may be async.
 */
export interface Scorer {
  readonly id: string;
  score(query: string, corpus: readonly CorpusRecord[]): ScoredRecord[] | Promise<ScoredRecord[]>;
}
