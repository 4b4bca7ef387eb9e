import { describe, it, expect } from 'vitest';
import { OllamaGenerator, createOllamaClient } from '../src/providers/ollama/ollama-generator.js';
import { buildGroundedPrompt, DEFAULT_SYSTEM_PROMPT } from '../src/generation/grounded-prompt.js';
import { CollaboratorUnavailableError } from '../src/core/errors.js';

interface SentRequest {
	url: string;
	body: unknown;
	signal: AbortSignal | undefined;
}

function chunk(content: string, done: boolean): string {
	return `${JSON.stringify({ model: 'llama3.2', message: { role: 'assistant', content }, done })}\n`;
}

/**
 * A stand-in for the Ollama HTTP API. Each request streams `first`, then either `rest` or,
 * when `rest` is undefined, nothing more until its signal aborts.
 */
function fakeOllamaServer(replies: Array<{ first: string; rest?: string }>) {
	const sent: SentRequest[] = [];
	const encoder = new TextEncoder();
	const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
		const signal = init?.signal ?? undefined;
		const body = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
		sent.push({ url: String(input), body, signal });
		const reply = replies[sent.length - 1] ?? { first: chunk('', true) };
		const stream = new ReadableStream<Uint8Array>({
			start(controller) {
				controller.enqueue(encoder.encode(reply.first));
				if (reply.rest !== undefined) {
					controller.enqueue(encoder.encode(reply.rest));
					controller.close();
					return;
				}
				if (signal) signal.addEventListener('abort', () => controller.error(signal.reason), { once: true });
			},
		});
		return new Response(stream, { status: 200, headers: { 'content-type': 'application/x-ndjson' } });
	};
	return { sent, fetchImpl };
}

describe('OllamaGenerator', () => {
	it('streams the chat and joins the reply', async () => {
		const server = fakeOllamaServer([{ first: chunk('Flush ', false), rest: chunk('the column.', true) }]);
		const client = createOllamaClient({ host: 'http://ollama.test:11434', fetch: server.fetchImpl });

		const answer = await new OllamaGenerator({ model: 'llama3.2' }, client).generate('Low signal?', ['Dirty detector.']);

		expect(answer).toBe('Flush the column.');
		expect(server.sent).toHaveLength(1);
		expect(server.sent[0]?.url).toBe('http://ollama.test:11434/api/chat');
		expect(server.sent[0]?.body).toMatchObject({
			model: 'llama3.2',
			messages: [
				{ role: 'system', content: DEFAULT_SYSTEM_PROMPT },
				{ role: 'user', content: buildGroundedPrompt('Low signal?', ['Dirty detector.']).prompt },
			],
			stream: true,
		});
	});

	it('passes the temperature as a model option', async () => {
		const server = fakeOllamaServer([{ first: chunk('ok', true), rest: '' }]);
		const client = createOllamaClient({ host: 'http://ollama.test:11434', fetch: server.fetchImpl });

		await new OllamaGenerator({ model: 'llama3.2', temperature: 0 }, client).generate('q', ['ctx']);

		expect(server.sent[0]?.body).toMatchObject({ options: { temperature: 0 } });
	});

	it('cancels the HTTP request when the signal fires', async () => {
		const server = fakeOllamaServer([{ first: chunk('partial', false) }]);
		const client = createOllamaClient({ host: 'http://ollama.test:11434', fetch: server.fetchImpl });
		const ac = new AbortController();

		const pending = new OllamaGenerator({ model: 'llama3.2' }, client).generate('q', ['ctx'], { signal: ac.signal });
		ac.abort();

		await expect(pending).rejects.toBeInstanceOf(CollaboratorUnavailableError);
		expect(server.sent[0]?.signal?.aborted).toBe(true);
	});

	it('leaves other requests on a shared client running', async () => {
		const server = fakeOllamaServer([{ first: chunk('partial', false) }, { first: chunk('still ', false), rest: chunk('here', true) }]);
		const generator = new OllamaGenerator(
			{ model: 'llama3.2' },
			createOllamaClient({ host: 'http://ollama.test:11434', fetch: server.fetchImpl })
		);
		const ac = new AbortController();

		const cancelled = generator.generate('first', ['ctx'], { signal: ac.signal });
		const other = generator.generate('second', ['ctx']);
		ac.abort();

		await expect(cancelled).rejects.toBeInstanceOf(CollaboratorUnavailableError);
		await expect(other).resolves.toBe('still here');
		expect(server.sent[1]?.signal?.aborted).toBe(false);
	});

	it('wraps transport failures', async () => {
		const client = createOllamaClient({
			host: 'http://ollama.test:11434',
			fetch: async () => {
				throw new Error('connect ECONNREFUSED');
			},
		});

		await expect(new OllamaGenerator({ model: 'llama3.2' }, client).generate('q', ['ctx'])).rejects.toThrow(
			/^Collaborator unavailable: generator \(ollama: .*ECONNREFUSED/
		);
	});
});
