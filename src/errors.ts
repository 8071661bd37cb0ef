export class ResearchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A single query against the post source failed; the query is skipped. */
export class SourceUnavailableError extends ResearchError {
  constructor(readonly query: string, readonly scope: string, message: string, options?: { cause?: unknown }) {
    super(`r/${scope} "${query}": ${message}`, options);
  }
}

export class CorpusMissingError extends ResearchError {
  constructor(readonly filePath: string) {
    super(`Corpus file not found at ${filePath}`);
  }
}

export class CorpusUnreadableError extends ResearchError {
  constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
    super(`Unable to read corpus ${filePath}: ${message}`, options);
  }
}

export class ProfileError extends ResearchError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
