import type { DualPoolDispatcher, RouteOutcome } from '@attention-gw/core';

import { SignatureVerificationError } from '../../errors';
import { parseMessagePayload } from '../../routes/message-payload-schema';
import type { AppLogger } from '../../telemetry/logger';
import type { GatewayMetrics } from '../../telemetry/metrics';
import { toInboundMessage, type DropReason, type MessageSanitizer } from '../inbound/sanitizer';
import { verifyRequestSignature } from '../inbound/signature';

export interface IngestInput {
  body: unknown;
  signatureHeader?: string;
  rawBody: Buffer | string;
}

export type IngestResult =
  | { status: 'accepted'; sessionId: string; messageId: string; outcome: RouteOutcome }
  | { status: 'dropped'; reason: DropReason };

export interface IngestServiceOptions {
  signingSecret?: string;
}

/** Entry point for bridge events: authenticate, validate, clean, then admit. */
export class IngestService {
  constructor(
    private readonly dispatcher: Pick<DualPoolDispatcher, 'onMessage'>,
    private readonly sanitizer: MessageSanitizer,
    private readonly metrics: GatewayMetrics,
    private readonly logger: AppLogger,
    private readonly options: IngestServiceOptions = {},
  ) {}

  async ingest(input: IngestInput): Promise<IngestResult> {
    if (this.options.signingSecret) {
      const valid = verifyRequestSignature({
        secret: this.options.signingSecret,
        signatureHeader: input.signatureHeader,
        payload: input.rawBody,
      });

      if (!valid) {
        this.logger.warn('Rejected ingest request with invalid signature');
        throw new SignatureVerificationError();
      }
    }

    const event = parseMessagePayload(input.body);
    const sanitized = this.sanitizer.filter(event);

    if (sanitized.drop) {
      this.metrics.droppedMessages.inc({ reason: sanitized.drop });
      this.logger.debug(
        { sessionId: event.sessionId, senderId: event.sender.id, reason: sanitized.drop },
        'Dropped inbound message',
      );
      return { status: 'dropped', reason: sanitized.drop };
    }

    const message = toInboundMessage(event, sanitized);
    const outcome = await this.dispatcher.onMessage(message);

    return {
      status: 'accepted',
      sessionId: message.sessionId,
      messageId: message.messageId,
      outcome,
    };
  }
}
