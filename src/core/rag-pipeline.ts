import { newQueryId } from '../utils/ids.js';
import type { PipelineEvent, QueryFinishReason, RetrievalResult } from './types.js';
import { EventBus, type EventHook } from './event-bus.js';
import {
  CollaboratorUnavailableError,
  GenerationTimeoutError,
  QueryCancelledError,
  RagPipelineError,
  errorMessage,
} from './errors.js';
import type { CorpusStore } from '../corpus/corpus-store.js';
import type { Scorer } from '../retrieval/scorer.js';
import type { RetrieverPort } from '../retrieval/retriever.js';
import { CorpusRetriever } from '../retrieval/corpus-retriever.js';
import { assertTopK } from '../retrieval/ranker.js';
import type { Generator } from '../generation/generator.js';
import { ConcatenatingGenerator } from '../generation/concatenating-generator.js';
import { DEFAULT_NO_INFORMATION_MESSAGE } from '../generation/messages.js';
import { silentLogger, type Logger } from '../logging/logger.js';

export const DEFAULT_TOP_K = 2;
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;

export interface PipelineHooks {
  /** Called for every event of every query. A hook that throws is logged and ignored. */
  onEvent?: EventHook;
}

export interface RagPipelineConfig {
  corpus: CorpusStore;
  /** Defaults to keyword overlap. */
  scorer?: Scorer;
  /** Defaults to {@link ConcatenatingGenerator}. */
  generator?: Generator;
  defaultTopK?: number;
  /** Answer returned when nothing is retrieved. */
  noInformationMessage?: string;
  generationTimeoutMs?: number;
  logger?: Logger;
  hooks?: PipelineHooks;
}

export interface QueryOptions {
  k?: number;
  signal?: AbortSignal;
  traceId?: string;
}

export interface QueryRun {
  readonly queryId: string;
  readonly events: AsyncIterable<PipelineEvent>;
  readonly result: Promise<string>;
}

interface QueryContext {
  queryId: string;
  query: string;
  k: number;
  signal?: AbortSignal;
  bus: EventBus;
  log: Logger;
}

/**
 * Retrieve-then-generate for a single query.
 *
 * Each call gets its own event bus and logger child; the only shared state is the read-only
 * corpus, so any number of queries may be in flight at once.
 */
export class RagPipeline {
  private readonly retriever: RetrieverPort;
  private readonly generator: Generator;
  private readonly defaultTopK: number;
  private readonly noInformationMessage: string;
  private readonly generationTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly config: RagPipelineConfig) {
    this.retriever = new CorpusRetriever(config.corpus, config.scorer);
    this.noInformationMessage = config.noInformationMessage ?? DEFAULT_NO_INFORMATION_MESSAGE;
    this.generator = config.generator ?? new ConcatenatingGenerator({ noInformationMessage: this.noInformationMessage });
    this.defaultTopK = config.defaultTopK ?? DEFAULT_TOP_K;
    this.generationTimeoutMs = config.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.logger = config.logger ?? silentLogger;
    assertTopK(this.defaultTopK);
  }

  get generatorId(): string {
    return this.generator.id;
  }

  async answer(query: string, k: number = this.defaultTopK): Promise<string> {
    return this.run(query, { k }).result;
  }

  run(query: string, opts: QueryOptions = {}): QueryRun {
    const queryId = newQueryId();
    const log = this.logger.child({ queryId });
    const bus = new EventBus({
      meta: opts.traceId ? { traceId: opts.traceId } : undefined,
      onHookError: (err, ev) => log.warn({ err, event: ev.type }, 'event hook failed'),
    });
    const onEvent = this.config.hooks?.onEvent;
    if (onEvent) bus.subscribe(onEvent);

    const ctx: QueryContext = { queryId, query, k: opts.k ?? this.defaultTopK, signal: opts.signal, bus, log };
    return { queryId, events: bus, result: this.execute(ctx) };
  }

  private async execute(ctx: QueryContext): Promise<string> {
    const { queryId, query, k, bus, log } = ctx;
    const startedAt = Date.now();
    const finish = (reason: QueryFinishReason) => {
      const durationMs = Date.now() - startedAt;
      bus.emit({ type: 'query_finish', queryId, reason, durationMs, at: Date.now() });
      bus.close();
      log.info({ reason, durationMs }, 'query finished');
    };

    bus.emit({ type: 'query_start', queryId, query, topK: k, startedAt });
    log.debug({ query, topK: k }, 'query started');

    try {
      assertTopK(k);
      this.throwIfCancelled(ctx);

      bus.emit({ type: 'retrieval_query', query, topK: k, at: Date.now() });
      const retrieved = await this.retriever.retrieve(query, k);
      bus.emit({ type: 'retrieval_results', query, topK: k, resultCount: retrieved.length, at: Date.now() });
      log.debug({ resultCount: retrieved.length }, 'context retrieved');

      this.throwIfCancelled(ctx);
      if (retrieved.length === 0) {
        finish('no_context');
        return this.noInformationMessage;
      }

      bus.emit({ type: 'generation_start', generator: this.generator.id, contextCount: retrieved.length, at: Date.now() });
      const answer = await this.generate(ctx, retrieved);
      bus.emit({ type: 'generation_finish', generator: this.generator.id, answerLength: answer.length, at: Date.now() });

      finish('answered');
      return answer;
    } catch (e) {
      const cancelled = e instanceof QueryCancelledError;
      bus.emit({ type: 'error', error: errorMessage(e), raw: e, at: Date.now() });
      if (!cancelled) log.error({ err: e }, 'query failed');
      finish(cancelled ? 'cancelled' : 'error');
      throw e;
    }
  }

  private async generate(ctx: QueryContext, contexts: RetrievalResult): Promise<string> {
    const timeoutMs = this.generationTimeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new GenerationTimeoutError(timeoutMs));
    }, timeoutMs);
    const onCallerAbort = () => controller.abort(ctx.signal?.reason);
    ctx.signal?.addEventListener('abort', onCallerAbort, { once: true });

    // Settles on abort even when the generator ignores its signal.
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    try {
      return await Promise.race([this.generator.generate(ctx.query, contexts, { signal: controller.signal }), aborted]);
    } catch (e) {
      if (timedOut) throw new GenerationTimeoutError(timeoutMs);
      if (ctx.signal?.aborted) throw new QueryCancelledError(ctx.queryId);
      if (e instanceof RagPipelineError) throw e;
      throw new CollaboratorUnavailableError('generator', `${this.generator.id}: ${errorMessage(e)}`, e);
    } finally {
      clearTimeout(timer);
      ctx.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private throwIfCancelled(ctx: QueryContext): void {
    if (ctx.signal?.aborted) throw new QueryCancelledError(ctx.queryId);
  }
}
