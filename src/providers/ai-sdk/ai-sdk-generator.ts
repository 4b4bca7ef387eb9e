import { createOpenAI } from '@ai-sdk/openai';
import { generateText, type LanguageModel } from 'ai';
import type { GenerateOptions, Generator } from '../../generation/generator.js';
import { buildGroundedPrompt } from '../../generation/grounded-prompt.js';
import { CollaboratorUnavailableError, errorMessage } from '../../core/errors.js';
import type { AiSdkProviderConfig } from '../provider-config.js';

export interface AiSdkGeneratorOptions {
  model: LanguageModel;
  system?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export class AiSdkGenerator implements Generator {
  readonly id = 'ai-sdk';

  constructor(private readonly opts: AiSdkGeneratorOptions) {}

  async generate(query: string, contexts: readonly string[], opts: GenerateOptions = {}): Promise<string> {
    const { system, prompt } = buildGroundedPrompt(query, contexts, this.opts.system);
    try {
      const res = await generateText({
        model: this.opts.model,
        system,
        prompt,
        temperature: this.opts.temperature,
        maxOutputTokens: this.opts.maxOutputTokens,
        abortSignal: opts.signal,
      });
      return res.text;
    } catch (e) {
      throw new CollaboratorUnavailableError('generator', `ai-sdk: ${errorMessage(e)}`, e);
    }
  }
}

/** `openai/gpt-4o-mini` and `gpt-4o-mini` name the same model. */
export function createOpenAiModel(cfg: AiSdkProviderConfig, modelId: string): LanguageModel {
  const openai = createOpenAI({ apiKey: cfg.openaiApiKey, baseURL: cfg.openaiBaseUrl });
  return openai(modelId.replace(/^openai\//, ''));
}
