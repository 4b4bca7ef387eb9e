import { setTimeout as sleep } from 'node:timers/promises';
import type { GenerateOptions, Generator } from './generator.js';
import { CONTEXT_SEPARATOR, DEFAULT_DISCLAIMER, DEFAULT_NO_INFORMATION_MESSAGE } from './messages.js';

export interface ConcatenatingGeneratorOptions {
  noInformationMessage?: string;
  disclaimer?: string;
  /** Simulated service round trip, applied only when there is context to answer from. */
  latencyMs?: number;
}

/**
 * Stand-in for a generation service: echoes the query and the retrieved texts back in order,
 * separated by blank lines, followed by a disclaimer.
 */
export class ConcatenatingGenerator implements Generator {
  readonly id = 'concat';
  private readonly noInformationMessage: string;
  private readonly disclaimer: string;
  private readonly latencyMs: number;

  constructor(opts: ConcatenatingGeneratorOptions = {}) {
    this.noInformationMessage = opts.noInformationMessage ?? DEFAULT_NO_INFORMATION_MESSAGE;
    this.disclaimer = opts.disclaimer ?? DEFAULT_DISCLAIMER;
    this.latencyMs = Math.max(0, opts.latencyMs ?? 0);
  }

  async generate(query: string, contexts: readonly string[], opts: GenerateOptions = {}): Promise<string> {
    if (contexts.length === 0) return this.noInformationMessage;

    const answer = [
      `Based on the information I have, for your query about '${query}':`,
      contexts.join(CONTEXT_SEPARATOR),
      this.disclaimer,
    ].join(CONTEXT_SEPARATOR);

    if (this.latencyMs > 0) await sleep(this.latencyMs, undefined, { signal: opts.signal });
    return answer;
  }
}
