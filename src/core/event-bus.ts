import type { PipelineEvent, PipelineEventMeta } from './types.js';
import { AsyncQueue } from './internal/async-queue.js';

export type EventHook = (ev: PipelineEvent) => void | Promise<void>;

export type HookErrorHandler = (error: unknown, ev: PipelineEvent) => void;

export interface EventBusOptions {
  /** Stamped onto every emitted event that carries no meta of its own. */
  meta?: PipelineEventMeta;
  onHookError?: HookErrorHandler;
}

export class EventBus implements AsyncIterable<PipelineEvent> {
  private readonly q = new AsyncQueue<PipelineEvent>();
  private readonly hooks = new Set<EventHook>();

  constructor(private readonly opts: EventBusOptions = {}) {}

  emit(ev: PipelineEvent): void {
    const event: PipelineEvent = this.opts.meta && !ev.meta ? { ...ev, meta: this.opts.meta } : ev;
    // Hooks never fail the query; their errors go to onHookError.
    for (const h of this.hooks) {
      void Promise.resolve()
        .then(() => h(event))
        .catch((e: unknown) => this.opts.onHookError?.(e, event));
    }
    this.q.push(event);
  }

  subscribe(hook: EventHook): () => void {
    this.hooks.add(hook);
    return () => this.hooks.delete(hook);
  }

  close(): void {
    this.q.close();
  }

  get isClosed(): boolean {
    return this.q.isClosed;
  }

  /** Events emitted but not yet consumed. */
  get pending(): number {
    return this.q.size;
  }

  [Symbol.asyncIterator](): AsyncIterator<PipelineEvent> {
    return this.q[Symbol.asyncIterator]();
  }
}
