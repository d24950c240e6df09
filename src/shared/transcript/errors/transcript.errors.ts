/**
 * Network-layer failure carried into retry classification.
 */
export class TranscriptRequestError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
    readonly retryAfterSeconds?: number,
  ) {
    super(message);
    this.name = 'TranscriptRequestError';
  }
}

/**
 * The remote service reported that no transcript exists for the content.
 */
export class TranscriptUnavailableError extends Error {
  constructor(
    readonly contentId: string,
    reason: string,
  ) {
    super(`No transcript for ${contentId}: ${reason}`);
    this.name = 'TranscriptUnavailableError';
  }
}

/**
 * Malformed configuration handed to a component. Raised, never swallowed.
 */
export class TranscriptConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranscriptConfigError';
  }
}
