export interface CorpusRecord {
  readonly id: string;
  readonly text: string;
}

export interface ScoredRecord {
  recordId: string;
  text: string;
  score: number;
}

/** Ordered record texts, at most K of them. */
export type RetrievalResult = string[];

export type QueryFinishReason = 'answered' | 'no_context' | 'cancelled' | 'error';

export interface PipelineEventMeta {
  traceId?: string;
}

type PipelineEventCore =
  | { type: 'query_start'; queryId: string; query: string; topK: number; startedAt: number }
  | { type: 'retrieval_query'; query: string; topK: number; at: number }
  | { type: 'retrieval_results'; query: string; topK: number; resultCount: number; at: number }
  | { type: 'generation_start'; generator: string; contextCount: number; at: number }
  | { type: 'generation_finish'; generator: string; answerLength: number; at: number }
  | { type: 'error'; error: string; raw?: unknown; at: number }
  | { type: 'query_finish'; queryId: string; reason: QueryFinishReason; durationMs: number; at: number };

export type PipelineEvent = PipelineEventCore & { meta?: PipelineEventMeta };
