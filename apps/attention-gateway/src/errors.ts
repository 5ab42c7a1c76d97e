/** Error thrown when an ingest request carries a missing or wrong signature. */
export class SignatureVerificationError extends Error {
  readonly statusCode = 403;

  constructor(message = 'Invalid ingest signature') {
    super(message);
    this.name = 'SignatureVerificationError';
  }
}

/** Raised when an inbound message body does not match the ingest contract. */
export class InvalidPayloadError extends Error {
  readonly statusCode = 400;

  constructor(
    message = 'Invalid message payload',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'InvalidPayloadError';
  }
}

/** Wraps failures that occur while handing replies to the callback endpoint. */
export class ReplyDeliveryError extends Error {
  readonly statusCode = 502;

  constructor(
    message = 'Failed to deliver reply',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ReplyDeliveryError';
  }
}
