import type { DualPoolDispatcher, SessionStateStore } from '@attention-gw/core';
import helmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import Fastify, {
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';

import type { AppConfig } from '../config';
import { registerHealthRoutes } from '../routes/health';
import { registerMessageRoutes } from '../routes/messages';
import { registerSessionRoutes } from '../routes/sessions';
import type { IngestService } from '../services/attention/ingest-service';
import type { AppLogger } from '../telemetry/logger';
import type { GatewayMetrics } from '../telemetry/metrics';

import type { GatewayFastifyInstance } from './types';

export type { GatewayFastifyInstance } from './types';

export interface ServerOptions {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  ingestService: Pick<IngestService, 'ingest'>;
  store: Pick<SessionStateStore, 'peek' | 'size'>;
  dispatcher: Pick<DualPoolDispatcher, 'cyclePhase' | 'activeCycles'>;
}

/**
 * Build the Fastify server exposing message intake, session inspection,
 * health and metrics, plus the operational middleware (helmet, rate limiting,
 * correlation ids).
 */
export async function createServer(options: ServerOptions): Promise<GatewayFastifyInstance> {
  const app = Fastify<
    RawServerDefault,
    RawRequestDefaultExpression<RawServerDefault>,
    RawReplyDefaultExpression<RawServerDefault>,
    AppLogger
  >({
    logger: options.logger,
    disableRequestLogging: options.config.env === 'production',
  });

  app.addContentTypeParser('application/json', { parseAs: 'buffer' }, (request, payload, done) => {
    const buffer = Buffer.isBuffer(payload) ? payload : Buffer.from(payload);
    request.rawBody = buffer;
    if (buffer.length === 0) {
      done(null, {});
      return;
    }

    try {
      done(null, JSON.parse(buffer.toString('utf8')));
    } catch (error) {
      request.log.debug({ error }, 'Rejected request body that is not JSON');
      done(Object.assign(new Error('Body is not valid JSON'), { statusCode: 400 }), undefined);
    }
  });

  await app.register(helmet, {
    global: true,
  });

  await app.register(fastifyRateLimit, {
    global: false,
    max: options.config.rateLimit.max,
    timeWindow: options.config.rateLimit.timeWindow,
  });

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId =
      firstHeader(request.headers['x-request-id']) ??
      firstHeader(request.headers['x-correlation-id']) ??
      request.id;

    void reply.header('x-request-id', correlationId);
    request.headers['x-correlation-id'] = correlationId;
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: reply.getHeader('x-request-id'),
      },
      'Request completed',
    );
    done();
  });

  await registerHealthRoutes(app, {
    activeCycles: () => options.dispatcher.activeCycles,
    cachedSessions: () => options.store.size,
  });
  await registerMessageRoutes(app, {
    service: options.ingestService,
    metrics: options.metrics,
    rateLimit: options.config.rateLimit,
  });
  await registerSessionRoutes(app, {
    store: options.store,
    dispatcher: options.dispatcher,
  });

  app.get('/metrics', async (_, reply) => {
    const payload = await options.metrics.registry.metrics();
    return reply.type(options.metrics.registry.contentType).send(payload);
  });

  return app;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const header = Array.isArray(value) ? value[0] : value;
  return header ? header : undefined;
}
