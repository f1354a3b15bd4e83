export type PipelineStage = 'input' | 'fetch' | 'extract' | 'write' | 'config';

export class PageclipError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PageclipError';
    this.stage = stage;
  }
}

/** Navigation or network failure while rendering a page. */
export class FetchError extends PageclipError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('fetch', message, options);
    this.name = 'FetchError';
    this.url = url;
  }
}

/** No cascade stage produced a content root. */
export class ExtractionError extends PageclipError {
  readonly url: string;
  /** Selectors worth retrying with `--selector`. */
  readonly suggestions: string[];

  constructor(url: string, message: string, suggestions: string[] = []) {
    super('extract', message);
    this.name = 'ExtractionError';
    this.url = url;
    this.suggestions = suggestions;
  }
}

export class OutputWriteError extends PageclipError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('write', message, options);
    this.name = 'OutputWriteError';
    this.path = path;
  }
}

/** Missing or invalid configuration. The only error that aborts a command outright. */
export class ConfigError extends PageclipError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
