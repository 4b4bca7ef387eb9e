import { Ollama } from 'ollama';
import type { GenerateOptions, Generator } from '../../generation/generator.js';
import { buildGroundedPrompt } from '../../generation/grounded-prompt.js';
import { CollaboratorUnavailableError, errorMessage } from '../../core/errors.js';
import type { OllamaProviderConfig } from '../provider-config.js';

export interface OllamaChatRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  options?: { temperature?: number };
}

/** One streamed chat response. `abort()` cancels this request only. */
export interface OllamaChatStream extends AsyncIterable<{ message: { content: string } }> {
  abort(): void;
}

/** The slice of the ollama-js client this generator talks to. */
export interface OllamaChatClient {
  chat(req: OllamaChatRequest): Promise<OllamaChatStream>;
}

export function createOllamaClient(cfg: OllamaProviderConfig): OllamaChatClient {
  const ollama = new Ollama({ host: cfg.host, headers: cfg.headers, fetch: cfg.fetch });
  return {
    chat: (req) => ollama.chat({ ...req, stream: true }),
  };
}

export interface OllamaGeneratorOptions {
  model: string;
  system?: string;
  temperature?: number;
}

export class OllamaGenerator implements Generator {
  readonly id = 'ollama';

  constructor(
    private readonly opts: OllamaGeneratorOptions,
    private readonly client: OllamaChatClient
  ) {}

  async generate(query: string, contexts: readonly string[], opts: GenerateOptions = {}): Promise<string> {
    const { system, prompt } = buildGroundedPrompt(query, contexts, this.opts.system);
    let stream: OllamaChatStream | undefined;
    const onAbort = () => stream?.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });
    try {
      stream = await this.client.chat({
        model: this.opts.model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ],
        options: this.opts.temperature === undefined ? undefined : { temperature: this.opts.temperature },
      });
      // The signal may have fired while the response headers were in flight.
      if (opts.signal?.aborted) stream.abort();

      let content = '';
      for await (const part of stream) {
        content += part.message.content;
      }
      return content;
    } catch (e) {
      throw new CollaboratorUnavailableError('generator', `ollama: ${errorMessage(e)}`, e);
    } finally {
      opts.signal?.removeEventListener('abort', onAbort);
    }
  }
}
