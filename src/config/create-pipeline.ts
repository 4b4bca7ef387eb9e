import path from 'node:path';
import type { CorpusStore } from '../corpus/corpus-store.js';
import { loadCorpusFile } from '../corpus/file-corpus-loader.js';
import { ConfigError } from '../core/errors.js';
import { RagPipeline, type PipelineHooks } from '../core/rag-pipeline.js';
import type { Generator } from '../generation/generator.js';
import { ConcatenatingGenerator } from '../generation/concatenating-generator.js';
import { AiSdkGenerator, createOpenAiModel } from '../providers/ai-sdk/ai-sdk-generator.js';
import { OllamaGenerator, createOllamaClient, type OllamaChatClient } from '../providers/ollama/ollama-generator.js';
import type { ProvidersConfig } from '../providers/provider-config.js';
import type { Scorer } from '../retrieval/scorer.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { ConfigStore } from './config-store.js';
import { loadPipelineSettings, type PipelineSettings } from './pipeline-settings.js';

export interface GeneratorDeps {
  providers?: ProvidersConfig;
  /** Replaces the ollama-js client built from `providers.ollama`. */
  ollamaClient?: OllamaChatClient;
}

export interface CreatePipelineDeps extends GeneratorDeps {
  corpus: CorpusStore;
  scorer?: Scorer;
  /** Defaults to a pino logger at `settings.logLevel`. */
  logger?: Logger;
  hooks?: PipelineHooks;
}

export function createGenerator(settings: PipelineSettings, deps: GeneratorDeps = {}): Generator {
  const gen = settings.generation;
  switch (gen.provider) {
    case 'concat':
      return new ConcatenatingGenerator({
        noInformationMessage: settings.noInformationMessage,
        disclaimer: settings.disclaimer,
        latencyMs: gen.latencyMs,
      });
    case 'ai-sdk': {
      if (!gen.model) throw new ConfigError('generation.model is required for the ai-sdk provider');
      return new AiSdkGenerator({
        model: createOpenAiModel(deps.providers?.aiSdk ?? {}, gen.model),
        system: gen.system,
        temperature: gen.temperature,
        maxOutputTokens: gen.maxOutputTokens,
      });
    }
    case 'ollama': {
      if (!gen.model) throw new ConfigError('generation.model is required for the ollama provider');
      const client = deps.ollamaClient ?? createOllamaClient(deps.providers?.ollama ?? {});
      return new OllamaGenerator({ model: gen.model, system: gen.system, temperature: gen.temperature }, client);
    }
  }
}

export function createPipeline(settings: PipelineSettings, deps: CreatePipelineDeps): RagPipeline {
  const logger = deps.logger ?? createLogger({ level: settings.logLevel });
  const generator = createGenerator(settings, deps);
  logger.debug({ generator: generator.id, topK: settings.topK, records: deps.corpus.size }, 'pipeline created');
  return new RagPipeline({
    corpus: deps.corpus,
    scorer: deps.scorer,
    generator,
    defaultTopK: settings.topK,
    noInformationMessage: settings.noInformationMessage,
    generationTimeoutMs: settings.generation.timeoutMs,
    logger,
    hooks: deps.hooks,
  });
}

export interface OpenPipelineOptions extends Omit<CreatePipelineDeps, 'corpus'> {
  configStore: ConfigStore;
  settingsKey?: string;
  /** Takes precedence over `settings.corpusPath`. */
  corpus?: CorpusStore;
  /** Directory a relative `corpusPath` resolves against; defaults to the working directory. */
  baseDir?: string;
}

/** Reads settings from a config store, loads the corpus they name and builds the pipeline. */
export async function openPipeline(opts: OpenPipelineOptions): Promise<RagPipeline> {
  const settings = await loadPipelineSettings(opts.configStore, opts.settingsKey);
  let corpus = opts.corpus;
  if (!corpus) {
    if (!settings.corpusPath) throw new ConfigError('corpusPath is required when no corpus is supplied');
    corpus = await loadCorpusFile(path.resolve(opts.baseDir ?? process.cwd(), settings.corpusPath));
  }
  return createPipeline(settings, { ...opts, corpus });
}
