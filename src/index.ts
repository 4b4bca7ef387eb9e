export * from './core/types.js';
export * from './core/errors.js';
export {
  RagPipeline,
  DEFAULT_TOP_K,
  DEFAULT_GENERATION_TIMEOUT_MS,
  type RagPipelineConfig,
  type PipelineHooks,
  type QueryOptions,
  type QueryRun,
} from './core/rag-pipeline.js';
export { EventBus, type EventHook } from './core/event-bus.js';

export { InMemoryCorpusStore, type CorpusStore } from './corpus/corpus-store.js';
export { loadCorpusFile, parseCorpus } from './corpus/file-corpus-loader.js';

export type { Scorer } from './retrieval/scorer.js';
export type { RetrieverPort } from './retrieval/retriever.js';
export { KeywordOverlapScorer, tokenizeQuery } from './retrieval/keyword-scorer.js';
export { rankTopK } from './retrieval/ranker.js';
export { CorpusRetriever } from './retrieval/corpus-retriever.js';

export type { Generator, GenerateOptions } from './generation/generator.js';
export { ConcatenatingGenerator, type ConcatenatingGeneratorOptions } from './generation/concatenating-generator.js';
export { buildGroundedPrompt, DEFAULT_SYSTEM_PROMPT } from './generation/grounded-prompt.js';
export { DEFAULT_DISCLAIMER, DEFAULT_NO_INFORMATION_MESSAGE } from './generation/messages.js';

export { AiSdkGenerator, createOpenAiModel } from './providers/ai-sdk/ai-sdk-generator.js';
export { OllamaGenerator, createOllamaClient, type OllamaChatClient, type OllamaChatStream } from './providers/ollama/ollama-generator.js';
export type { ProvidersConfig, AiSdkProviderConfig, OllamaProviderConfig } from './providers/provider-config.js';

export { MemoryConfigStore, type ConfigStore } from './config/config-store.js';
export { FileConfigStore } from './config/file-config-store.js';
export {
  loadPipelineSettings,
  parsePipelineSettings,
  pipelineSettingsSchema,
  type PipelineSettings,
  type PipelineSettingsInput,
} from './config/pipeline-settings.js';
export { createGenerator, createPipeline, openPipeline } from './config/create-pipeline.js';

export { createLogger, type Logger, type LogLevel } from './logging/logger.js';
