/** Base class for failures raised by attention collaborators. */
export abstract class AttentionError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
  }
}

/** The classifier errored, timed out or answered with something unusable. */
export class ClassifierUnavailableError extends AttentionError {
  readonly code = 'CLASSIFIER_UNAVAILABLE';

  constructor(message = 'Classifier unavailable', cause?: unknown) {
    super(message, cause);
    this.name = 'ClassifierUnavailableError';
  }
}

/** Raised by generators when no reply could be produced for a batch. */
export class GenerationFailedError extends AttentionError {
  readonly code = 'GENERATION_FAILED';

  constructor(message = 'Response generation failed', cause?: unknown) {
    super(message, cause);
    this.name = 'GenerationFailedError';
  }
}

/** Wraps durable store read/write failures. */
export class StoreUnavailableError extends AttentionError {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(message = 'Session state store unavailable', cause?: unknown) {
    super(message, cause);
    this.name = 'StoreUnavailableError';
  }
}

/** The durable record exists but cannot be read back; it is safe to overwrite. */
export class CorruptSessionStateError extends AttentionError {
  readonly code = 'STATE_CORRUPT';

  constructor(message = 'Corrupt session state', cause?: unknown) {
    super(message, cause);
    this.name = 'CorruptSessionStateError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
