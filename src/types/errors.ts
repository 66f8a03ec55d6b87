/**
 * Error kinds raised by the ingestion pipeline.
 * Each carries the stage that failed so the CLI can report it.
 */

export type PipelineStage = 'fetch' | 'parse' | 'normalize' | 'store' | 'render';

export class PipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.stage = stage;
  }
}

export class FetchError extends PipelineError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super('fetch', message, { cause: options.cause });
    this.name = 'FetchError';
    this.url = url;
    this.status = options.status;
  }
}

export class FeedParseError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('parse', message, options);
    this.name = 'FeedParseError';
  }
}

export class MalformedEntryError extends PipelineError {
  readonly entryId?: string;

  constructor(message: string, entryId?: string) {
    super('normalize', entryId ? `${message} (entry ${entryId})` : message);
    this.name = 'MalformedEntryError';
    this.entryId = entryId;
  }
}

export class StorageUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store', message, options);
    this.name = 'StorageUnavailableError';
  }
}

export class RenderError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('render', message, options);
    this.name = 'RenderError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
