import type { RetrievalResult, ScoredRecord } from '../core/types.js';
import { InvalidArgumentError } from '../core/errors.js';

export function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k < 1) throw new InvalidArgumentError('k', `expected a positive integer, got ${k}`);
}

/**
 * Orders by score descending and keeps the first `k` texts.
 *
 * The sort is stable: equal scores keep their input order.
 */
export function rankTopK(scored: readonly ScoredRecord[], k: number): RetrievalResult {
  assertTopK(k);
  return scored
    .filter((s) => s.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, k)
    .map((s) => s.text);
}
