import type { AttentionObserver } from '@attention-gw/core';

import type { GatewayMetrics } from './metrics';

/** Bridge core attention events onto the Prometheus collectors. */
export function createMetricsObserver(metrics: GatewayMetrics): AttentionObserver {
  return {
    onDecision: (_message, decision) => {
      metrics.decisions.inc({ action: decision.action, source: decision.source });
    },
    onRouted: (_message, outcome) => {
      metrics.routedMessages.inc({ outcome });
    },
    onCycleFinished: (summary) => {
      metrics.cycles.inc({ status: summary.status, reason: summary.closeReason });
      metrics.cycleBatchSize.observe(summary.batchSize);
    },
    onBackgroundOverflow: () => {
      metrics.backgroundOverflow.inc();
    },
    onFlush: (_sessionId, succeeded) => {
      metrics.storeFlushes.inc({ status: succeeded ? 'success' : 'error' });
    },
    onEvicted: () => {
      metrics.evictions.inc();
    },
    onMaintenance: (report) => {
      metrics.cachedSessions.set(report.cachedSessions);
    },
  };
}
