import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../src/core/event-bus.js';
import type { PipelineEvent } from '../src/core/types.js';

const started: PipelineEvent = { type: 'retrieval_query', query: 'ph', topK: 2, at: 1 };
const finished: PipelineEvent = { type: 'retrieval_results', query: 'ph', topK: 2, resultCount: 1, at: 2 };

describe('EventBus', () => {
	it('buffers events until they are read, including after close', async () => {
		const bus = new EventBus();
		bus.emit(started);
		bus.emit(finished);
		bus.close();

		expect(bus.pending).toBe(2);
		const seen: PipelineEvent[] = [];
		for await (const ev of bus) seen.push(ev);
		expect(seen).toEqual([started, finished]);
		expect(bus.isClosed).toBe(true);
	});

	it('wakes a waiting reader', async () => {
		const bus = new EventBus();
		const reader = bus[Symbol.asyncIterator]();
		const next = reader.next();
		bus.emit(started);
		expect(await next).toEqual({ value: started, done: false });
		bus.close();
		expect(await reader.next()).toEqual({ value: undefined, done: true });
	});

	it('drops events emitted after close', async () => {
		const bus = new EventBus();
		bus.close();
		bus.emit(started);
		expect(bus.pending).toBe(0);
	});

	it('stamps default meta onto events without their own', async () => {
		const bus = new EventBus({ meta: { traceId: 't-1' } });
		bus.emit(started);
		bus.emit({ ...finished, meta: { traceId: 'own' } });
		bus.close();

		const seen: PipelineEvent[] = [];
		for await (const ev of bus) seen.push(ev);
		expect(seen.map((e) => e.meta?.traceId)).toEqual(['t-1', 'own']);
	});

	it('calls hooks until unsubscribed', async () => {
		const bus = new EventBus();
		const hook = vi.fn();
		const unsubscribe = bus.subscribe(hook);

		bus.emit(started);
		await vi.waitFor(() => expect(hook).toHaveBeenCalledWith(started));
		unsubscribe();
		bus.emit(finished);
		await Promise.resolve();

		expect(hook).toHaveBeenCalledTimes(1);
	});

	it('routes hook failures to onHookError', async () => {
		const onHookError = vi.fn();
		const failure = new Error('listener crashed');
		const bus = new EventBus({ onHookError });
		bus.subscribe(async () => {
			throw failure;
		});

		bus.emit(started);

		await vi.waitFor(() => expect(onHookError).toHaveBeenCalledWith(failure, started));
	});
});
