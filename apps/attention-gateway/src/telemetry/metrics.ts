import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface GatewayMetrics {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDuration: Histogram<string>;
  decisions: Counter<string>;
  routedMessages: Counter<string>;
  droppedMessages: Counter<string>;
  cycles: Counter<string>;
  cycleBatchSize: Histogram<string>;
  backgroundOverflow: Counter<string>;
  storeFlushes: Counter<string>;
  evictions: Counter<string>;
  cachedSessions: Gauge<string>;
  outboundReplies: Counter<string>;
}

export interface MetricsOptions {
  prefix?: string;
  registry?: Registry;
}

export function createMetrics(options: MetricsOptions = {}): GatewayMetrics {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'attention_gateway_';

  collectDefaultMetrics({ register: registry, prefix });

  const requestCounter = new Counter({
    name: `${prefix}requests_total`,
    help: 'Total number of ingest requests processed',
    labelNames: ['method', 'status'],
    registers: [registry],
  });

  const requestDuration = new Histogram({
    name: `${prefix}request_duration_seconds`,
    help: 'Ingest request duration in seconds',
    labelNames: ['method', 'status'],
    buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [registry],
  });

  const decisions = new Counter({
    name: `${prefix}admission_decisions_total`,
    help: 'Admission decisions by action and the rule that produced them',
    labelNames: ['action', 'source'],
    registers: [registry],
  });

  const routedMessages = new Counter({
    name: `${prefix}routed_messages_total`,
    help: 'Admitted messages by routing outcome',
    labelNames: ['outcome'],
    registers: [registry],
  });

  const droppedMessages = new Counter({
    name: `${prefix}dropped_messages_total`,
    help: 'Inbound messages dropped before admission',
    labelNames: ['reason'],
    registers: [registry],
  });

  const cycles = new Counter({
    name: `${prefix}cycles_total`,
    help: 'Finished generation cycles by status and close reason',
    labelNames: ['status', 'reason'],
    registers: [registry],
  });

  const cycleBatchSize = new Histogram({
    name: `${prefix}cycle_batch_size`,
    help: 'Messages aggregated into a single generation call',
    buckets: [1, 2, 3, 5, 8, 13, 21],
    registers: [registry],
  });

  const backgroundOverflow = new Counter({
    name: `${prefix}background_overflow_total`,
    help: 'Deferred messages dropped because the background pool was full',
    registers: [registry],
  });

  const storeFlushes = new Counter({
    name: `${prefix}store_flushes_total`,
    help: 'Session state writes to the durable store',
    labelNames: ['status'],
    registers: [registry],
  });

  const evictions = new Counter({
    name: `${prefix}session_evictions_total`,
    help: 'Idle sessions removed from the in-memory cache',
    registers: [registry],
  });

  const cachedSessions = new Gauge({
    name: `${prefix}cached_sessions`,
    help: 'Sessions held in memory after the last maintenance pass',
    registers: [registry],
  });

  const outboundReplies = new Counter({
    name: `${prefix}outbound_replies_total`,
    help: 'Replies posted to the callback endpoint',
    labelNames: ['status'],
    registers: [registry],
  });

  return {
    registry,
    requestCounter,
    requestDuration,
    decisions,
    routedMessages,
    droppedMessages,
    cycles,
    cycleBatchSize,
    backgroundOverflow,
    storeFlushes,
    evictions,
    cachedSessions,
    outboundReplies,
  };
}
