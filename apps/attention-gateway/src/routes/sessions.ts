import type { DualPoolDispatcher, SessionStateStore } from '@attention-gw/core';

import type { GatewayFastifyInstance } from '../server/types';

export interface SessionRouteContext {
  store: Pick<SessionStateStore, 'peek'>;
  dispatcher: Pick<DualPoolDispatcher, 'cyclePhase'>;
}

/** Read-only view of a cached session. Never loads from the durable store. */
export async function registerSessionRoutes(
  app: GatewayFastifyInstance,
  context: SessionRouteContext,
): Promise<void> {
  app.get<{ Params: { sessionId: string } }>('/sessions/:sessionId', async (request, reply) => {
    const entry = context.store.peek(request.params.sessionId);
    if (!entry) {
      return reply.code(404).send({
        statusCode: 404,
        error: 'Not Found',
        message: `Session ${request.params.sessionId} is not cached`,
      });
    }

    return {
      ...entry.snapshot(),
      dirty: entry.dirty,
      pending: {
        accumulation: entry.accumulationSize,
        background: entry.backgroundSize,
      },
      cycle: context.dispatcher.cyclePhase(entry.sessionId) ?? null,
    };
  });
}
