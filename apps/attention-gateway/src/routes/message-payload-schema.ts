import { z } from 'zod';

import { InvalidPayloadError } from '../errors';
import type { InboundEvent } from '../services/inbound/sanitizer';

const segmentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('mention'), userId: z.string().min(1) }),
  z.object({
    type: z.literal('attachment'),
    kind: z.enum(['image', 'video', 'audio', 'file']),
    url: z.string().url().optional(),
  }),
]);

/**
 * Contract for events posted by the platform bridge. Either `text`, `segments`
 * or both may carry the message body; emptiness is decided later by the
 * sanitizer, not here.
 */
const messagePayloadSchema = z.object({
  sessionId: z.string().min(1),
  messageId: z.string().min(1).optional(),
  sender: z.object({
    id: z.string().min(1),
    name: z.string().optional(),
  }),
  text: z.string().optional(),
  segments: z.array(segmentSchema).max(100).optional(),
});

export function parseMessagePayload(payload: unknown): InboundEvent {
  const result = messagePayloadSchema.safeParse(payload);
  if (!result.success) {
    throw new InvalidPayloadError('Invalid message payload', result.error);
  }

  return result.data;
}
