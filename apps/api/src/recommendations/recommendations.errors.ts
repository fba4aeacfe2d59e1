import { errorMessage } from '../lib/errors';

export type PipelineFailureKind = 'embedding' | 'search' | 'unexpected';

export class EmbeddingError extends Error {
  readonly kind = 'embedding' as const;

  constructor(cause: unknown) {
    super(`Embedding failed: ${errorMessage(cause)}`, { cause });
    this.name = 'EmbeddingError';
  }
}

export class SearchError extends Error {
  readonly kind = 'search' as const;

  constructor(cause: unknown) {
    super(`Vector search failed: ${errorMessage(cause)}`, { cause });
    this.name = 'SearchError';
  }
}

export type PipelineFailure = {
  kind: PipelineFailureKind;
  message: string;
};

export function classifyFailure(err: unknown): PipelineFailure {
  if (err instanceof EmbeddingError || err instanceof SearchError) {
    return { kind: err.kind, message: err.message };
  }
  return { kind: 'unexpected', message: `Server error: ${errorMessage(err)}` };
}
