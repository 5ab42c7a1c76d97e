import type { GatewayFastifyInstance } from '../server/types';
import { SIGNATURE_HEADER } from '../services/inbound/signature';
import type { IngestService } from '../services/attention/ingest-service';
import type { GatewayMetrics } from '../telemetry/metrics';

export interface MessageRouteContext {
  service: Pick<IngestService, 'ingest'>;
  metrics: GatewayMetrics;
  rateLimit?: {
    max: number;
    timeWindow: string | number;
  };
}

/**
 * Register `POST /messages`, the intake for bridge events. Answers 202 once
 * the message has been admitted and routed; generation happens later.
 */
export async function registerMessageRoutes(
  app: GatewayFastifyInstance,
  context: MessageRouteContext,
): Promise<void> {
  app.post(
    '/messages',
    {
      config: {
        rateLimit: context.rateLimit,
      },
    },
    async (request, reply) => {
      const stopTimer = context.metrics.requestDuration.startTimer();
      let statusCode = 202;

      try {
        const header = request.headers[SIGNATURE_HEADER];
        const result = await context.service.ingest({
          body: request.body,
          signatureHeader: typeof header === 'string' ? header : undefined,
          rawBody: request.rawBody ?? JSON.stringify(request.body ?? {}),
        });

        context.metrics.requestCounter.inc({ method: request.method, status: '202' });
        return reply.code(202).send(result);
      } catch (error) {
        statusCode = inferStatusCode(error);
        context.metrics.requestCounter.inc({ method: request.method, status: String(statusCode) });
        throw error;
      } finally {
        stopTimer({ method: request.method, status: String(statusCode) });
      }
    },
  );
}

/** Map known error shapes to HTTP status codes for metric labels; anything else is a 500. */
function inferStatusCode(error: unknown): number {
  if (error && typeof error === 'object' && 'statusCode' in error) {
    const status = error.statusCode;
    if (typeof status === 'number') {
      return status;
    }
  }

  return 500;
}
