import type { RetrievalResult, ScoredRecord } from '../core/types.js';
import type { CorpusStore } from '../corpus/corpus-store.js';
import { CollaboratorUnavailableError, RagPipelineError, errorMessage } from '../core/errors.js';
import type { RetrieverPort } from './retriever.js';
import type { Scorer } from './scorer.js';
import { KeywordOverlapScorer } from './keyword-scorer.js';
import { assertTopK, rankTopK } from './ranker.js';

/** Corpus store -> scorer -> ranker. */
export class CorpusRetriever implements RetrieverPort {
  private readonly position: ReadonlyMap<string, number>;

  constructor(
    private readonly corpus: CorpusStore,
    private readonly scorer: Scorer = new KeywordOverlapScorer()
  ) {
    this.position = new Map(corpus.getAll().map((r, i) => [r.id, i]));
  }

  get scorerId(): string {
    return this.scorer.id;
  }

  async retrieve(query: string, topK: number): Promise<RetrievalResult> {
    assertTopK(topK);
    const records = this.corpus.getAll();
    if (records.length === 0) return [];

    let scored: ScoredRecord[];
    try {
      scored = await this.scorer.score(query, records);
    } catch (e) {
      if (e instanceof RagPipelineError) throw e;
      throw new CollaboratorUnavailableError('scorer', `${this.scorer.id}: ${errorMessage(e)}`, e);
    }

    return rankTopK(this.inCorpusOrder(scored), topK);
  }

  // Ties are broken by corpus insertion order whatever order the scorer used.
  private inCorpusOrder(scored: ScoredRecord[]): ScoredRecord[] {
    const keyed = scored.map((s) => {
      const pos = this.position.get(s.recordId);
      if (pos === undefined) throw new RagPipelineError(`Scorer ${this.scorer.id} returned unknown record "${s.recordId}"`);
      return { s, pos };
    });
    return keyed.sort((a, b) => a.pos - b.pos).map(({ s }) => s);
  }
}
