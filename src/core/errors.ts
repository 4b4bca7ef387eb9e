export class RagPipelineError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause ? { cause } : undefined);
    this.name = 'RagPipelineError';
  }
}

export class InvalidCorpusError extends RagPipelineError {
  constructor(detail: string, cause?: unknown) {
    super(`Invalid corpus: ${detail}`, cause);
    this.name = 'InvalidCorpusError';
  }
}

export class CorpusUnavailableError extends RagPipelineError {
  constructor(source: string, cause?: unknown) {
    super(`Corpus unavailable: ${source}`, cause);
    this.name = 'CorpusUnavailableError';
  }
}

export class InvalidArgumentError extends RagPipelineError {
  constructor(argument: string, detail: string) {
    super(`Invalid argument ${argument}: ${detail}`);
    this.name = 'InvalidArgumentError';
  }
}

export class ConfigError extends RagPipelineError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export type CollaboratorKind = 'scorer' | 'generator';

export class CollaboratorUnavailableError extends RagPipelineError {
  constructor(
    readonly collaborator: CollaboratorKind,
    detail?: string,
    cause?: unknown
  ) {
    super(`Collaborator unavailable: ${collaborator}${detail ? ` (${detail})` : ''}`, cause);
    this.name = 'CollaboratorUnavailableError';
  }
}

export class GenerationTimeoutError extends CollaboratorUnavailableError {
  constructor(readonly timeoutMs: number) {
    super('generator', `timed out after ${timeoutMs}ms`);
    this.name = 'GenerationTimeoutError';
  }
}

export class QueryCancelledError extends RagPipelineError {
  constructor(queryId: string) {
    super(`Query cancelled: ${queryId}`);
    this.name = 'QueryCancelledError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message || e.name : String(e);
}
