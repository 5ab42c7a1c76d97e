import {
  AdmissionPolicy,
  DualPoolDispatcher,
  SessionStateStore,
  StateDecayScheduler,
  createAguiGenerator,
  type SessionStateRepository,
} from '@attention-gw/core';

import { loadConfig, type AppConfig } from './config';
import { createServer, type GatewayFastifyInstance } from './server';
import { IngestService } from './services/attention/ingest-service';
import { createClassifier } from './services/classifier/http-classifier';
import { MessageSanitizer } from './services/inbound/sanitizer';
import { CallbackReplySink } from './services/replies/reply-sink';
import { InMemorySessionStateRepository, RedisSessionStateRepository } from './services/session';
import { createMetricsObserver } from './telemetry/attention-observer';
import { createComponentLogger, createLogger, type AppLogger } from './telemetry/logger';
import { createMetrics, type GatewayMetrics } from './telemetry/metrics';

export interface Application {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  server: GatewayFastifyInstance;
  store: SessionStateStore;
  dispatcher: DualPoolDispatcher;
  scheduler: StateDecayScheduler;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface ApplicationOverrides {
  config?: AppConfig;
  logger?: AppLogger;
  repository?: SessionStateRepository;
}

/**
 * Compose the attention gateway: configuration, logging and metrics, the
 * durable store driver, the classifier/generator/reply collaborators, the
 * attention core and the Fastify server.
 */
export async function createApplication(overrides: ApplicationOverrides = {}): Promise<Application> {
  const config = overrides.config ?? loadConfig();
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const metrics = createMetrics();
  const observer = createMetricsObserver(metrics);

  const repository = overrides.repository ?? createSessionRepository(config);
  const store = new SessionStateStore({
    repository,
    logger: createComponentLogger(logger, 'session-store'),
    observer,
    backgroundPoolCapacity: config.attention.backgroundPoolCapacity,
    ambientContextCapacity: config.attention.ambientContextCapacity,
  });

  const classifier = createClassifier(createComponentLogger(logger, 'classifier'), {
    ...config.classifier,
    timeoutMs: config.attention.classifierTimeoutMs,
  });
  const policy = new AdmissionPolicy(
    classifier,
    config.attention,
    createComponentLogger(logger, 'admission'),
    observer,
  );

  const generator = createAguiGenerator(createComponentLogger(logger, 'generator'), {
    baseUrl: config.agui.baseUrl,
    apiKey: config.agui.apiKey,
    timeoutMs: config.agui.timeoutMs,
  });

  const replySink = new CallbackReplySink(createComponentLogger(logger, 'replies'), metrics, {
    callbackUrl: config.replies.callbackUrl,
    timeoutMs: config.replies.timeoutMs,
    signingSecret: config.ingest.signingSecret,
  });

  const dispatcher = new DualPoolDispatcher(
    {
      store,
      policy,
      generator,
      replySink,
      logger: createComponentLogger(logger, 'dispatcher'),
      observer,
    },
    config.attention,
  );

  const scheduler = new StateDecayScheduler(
    store,
    config.attention,
    createComponentLogger(logger, 'maintenance'),
    observer,
  );

  const ingestService = new IngestService(
    dispatcher,
    new MessageSanitizer(config.ingest),
    metrics,
    logger,
    { signingSecret: config.ingest.signingSecret },
  );

  const server = await createServer({
    config,
    logger,
    metrics,
    ingestService,
    store,
    dispatcher,
  });

  return {
    config,
    logger,
    metrics,
    server,
    store,
    dispatcher,
    scheduler,
    start: async () => {
      await server.listen({ port: config.port, host: '0.0.0.0' });
      scheduler.start();
    },
    stop: async () => {
      await server.close();
      await scheduler.stop();
      await dispatcher.drain();

      const failures = await store.flushAll();
      if (failures > 0) {
        logger.error({ failures }, 'Session state could not be persisted before shutdown');
      }

      if (repository instanceof RedisSessionStateRepository) {
        try {
          await repository.close();
        } catch (error) {
          logger.warn({ error }, 'Failed to gracefully close Redis session store');
        }
      }
    },
  };
}

/** In-memory storage by default; Redis when the driver asks for it. */
function createSessionRepository(config: AppConfig): SessionStateRepository {
  if (config.session.driver === 'redis') {
    if (!config.session.redisUrl) {
      throw new Error('SESSION_STORE_DRIVER=redis requires REDIS_URL environment variable');
    }

    return new RedisSessionStateRepository({
      url: config.session.redisUrl,
      ttlSeconds: config.session.ttlSeconds,
    });
  }

  return new InMemorySessionStateRepository({ ttlSeconds: config.session.ttlSeconds });
}
