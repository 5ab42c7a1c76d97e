import type { CycleReply, ReplySink } from '@attention-gw/core';

import { ReplyDeliveryError } from '../../errors';
import type { AppLogger } from '../../telemetry/logger';
import type { GatewayMetrics } from '../../telemetry/metrics';
import { SIGNATURE_HEADER, createSignatureHeader } from '../inbound/signature';

export interface ReplySinkOptions {
  callbackUrl?: string;
  /** Signs callback bodies with the same header scheme the ingest route checks. */
  signingSecret?: string;
  attempts?: number;
  /** Base back-off; attempt `n` waits `n * retryDelayMs`. */
  retryDelayMs?: number;
  /** Per-attempt request timeout. */
  timeoutMs?: number;
}

/**
 * Hands finished replies to the platform bridge. Without a callback URL the
 * reply is only logged, which keeps local runs self-contained.
 */
export class CallbackReplySink implements ReplySink {
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly logger: AppLogger,
    private readonly metrics: GatewayMetrics,
    private readonly options: ReplySinkOptions = {},
  ) {
    this.attempts = Math.max(1, options.attempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 100;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async deliver(reply: CycleReply): Promise<void> {
    this.logger.info(
      {
        sessionId: reply.sessionId,
        cycleId: reply.cycleId,
        ownerSenderId: reply.ownerSenderId,
        messageIds: reply.messageIds,
        length: reply.replyText.length,
      },
      'Reply ready',
    );

    const callbackUrl = this.options.callbackUrl;
    if (!callbackUrl) {
      return;
    }

    try {
      await this.executeWithRetry(() => this.post(callbackUrl, reply));
      this.metrics.outboundReplies.inc({ status: 'success' });
    } catch (error) {
      this.metrics.outboundReplies.inc({ status: 'error' });
      throw new ReplyDeliveryError(`Failed to deliver reply for ${reply.sessionId}`, error);
    }
  }

  private async post(url: string, reply: CycleReply): Promise<void> {
    const body = JSON.stringify(reply);
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.signingSecret) {
      headers[SIGNATURE_HEADER] = createSignatureHeader(this.options.signingSecret, body);
    }

    const response = await fetch(url, {
      method: 'POST',
      headers,
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Reply callback responded with HTTP ${response.status}`);
    }
  }

  private async executeWithRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.attempts; attempt += 1) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;
        if (attempt === this.attempts) {
          break;
        }
        this.logger.debug({ attempt, error }, 'Reply callback failed; retrying');
        await delay(this.retryDelayMs * attempt);
      }
    }

    throw lastError;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
