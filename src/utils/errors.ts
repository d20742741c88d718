/**
 * Raised when no selected test type produced any text.
 */
export class GenerationError extends Error {
  failedTypes: string[];

  constructor(message: string, failedTypes: string[] = []) {
    super(message);
    this.name = 'GenerationError';
    this.failedTypes = failedTypes;
  }
}

/**
 * Raised when an issue, work item or page cannot be fetched.
 */
export class SourceFetchError extends Error {
  source: string;

  constructor(message: string, source: string) {
    super(message);
    this.name = 'SourceFetchError';
    this.source = source;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
