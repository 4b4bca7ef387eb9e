import { z } from 'zod';
import type { ConfigStore } from './config-store.js';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_GENERATION_TIMEOUT_MS, DEFAULT_TOP_K } from '../core/rag-pipeline.js';
import { LOG_LEVELS } from '../logging/logger.js';
import { DEFAULT_DISCLAIMER, DEFAULT_NO_INFORMATION_MESSAGE } from '../generation/messages.js';

export const PIPELINE_SETTINGS_KEY = 'pipeline';

export const generationSettingsSchema = z.object({
  provider: z.enum(['concat', 'ai-sdk', 'ollama']).default('concat'),
  /** Required for `ai-sdk` and `ollama`. */
  model: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_GENERATION_TIMEOUT_MS),
  latencyMs: z.number().int().nonnegative().default(0),
  system: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  /** Upper bound on the answer length; `ai-sdk` only. */
  maxOutputTokens: z.number().int().positive().optional(),
});

export const pipelineSettingsSchema = z.object({
  topK: z.number().int().positive().default(DEFAULT_TOP_K),
  noInformationMessage: z.string().min(1).default(DEFAULT_NO_INFORMATION_MESSAGE),
  disclaimer: z.string().min(1).default(DEFAULT_DISCLAIMER),
  corpusPath: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  generation: generationSettingsSchema.default({}),
});

export type GenerationProvider = z.infer<typeof generationSettingsSchema>['provider'];
export type GenerationSettings = z.infer<typeof generationSettingsSchema>;
export type PipelineSettings = z.infer<typeof pipelineSettingsSchema>;
export type PipelineSettingsInput = z.input<typeof pipelineSettingsSchema>;

export function parsePipelineSettings(raw: unknown): PipelineSettings {
  const parsed = pipelineSettingsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError('Invalid pipeline settings', issues);
  }
  return parsed.data;
}

export async function loadPipelineSettings(store: ConfigStore, key = PIPELINE_SETTINGS_KEY): Promise<PipelineSettings> {
  return parsePipelineSettings(await store.get(key));
}
