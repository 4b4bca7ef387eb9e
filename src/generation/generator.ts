export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * Generation collaborator: turns a query and its ordered context texts into an answer.
 * Real implementations call out to a text-generation service.
 */
export interface Generator {
  readonly id: string;
  generate(query: string, contexts: readonly string[], opts?: GenerateOptions): Promise<string>;
}
