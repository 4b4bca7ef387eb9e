export interface AiSdkProviderConfig {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
}

export interface OllamaProviderConfig {
  host?: string;
  headers?: Record<string, string>;
  /** Replaces the global `fetch` the ollama-js client sends requests with. */
  fetch?: typeof fetch;
}

export interface ProvidersConfig {
  aiSdk?: AiSdkProviderConfig;
  ollama?: OllamaProviderConfig;
}
