import type {
  FastifyInstance,
  FastifyTypeProviderDefault,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from 'fastify';

import type { AppLogger } from '../telemetry/logger';

export type GatewayFastifyInstance = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  AppLogger,
  FastifyTypeProviderDefault
>;

declare module 'fastify' {
  interface FastifyRequest {
    /** Unparsed JSON body, kept for signature checks. */
    rawBody?: Buffer;
  }
}
