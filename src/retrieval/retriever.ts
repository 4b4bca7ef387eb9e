import type { RetrievalResult } from '../core/types.js';

export interface RetrieverPort {
  retrieve(query: string, topK: number): Promise<RetrievalResult>;
}
