/**
 * Raised when an image could not be turned into a text document. The analyzer is never
 * invoked after this error.
 */
export class RecognitionFailedError extends Error {
  readonly code = "recognition_failed";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecognitionFailedError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
