import promClient from 'prom-client';

// Default metrics (CPU, memory, etc.), registered once per registry
if (!promClient.register.getSingleMetric('worker_process_cpu_user_seconds_total')) {
  promClient.collectDefaultMetrics({
    prefix: 'worker_',
    gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
  });
}

export const register = promClient.register;

// ============================================
// Lifecycle Metrics
// ============================================

/**
 * Gauge: current lifecycle phase, one series per phase, 1 for the active one
 * Labels: phase (buffering/selecting-provider/live/failed)
 */
export const lifecyclePhase = new promClient.Gauge({
  name: 'messaging_lifecycle_phase',
  help: 'Current messaging lifecycle phase (1 = active)',
  labelNames: ['phase'],
});

/**
 * Histogram: time from lifecycle start until the proxy is live and drained
 */
export const goLiveDuration = new promClient.Histogram({
  name: 'messaging_go_live_duration_seconds',
  help: 'Duration from lifecycle start to live (including provider selection)',
  buckets: [0.01, 0.1, 0.5, 1, 5, 10, 30, 60, 120],
});

/**
 * Counter: provider probe attempts
 * Labels: provider, outcome (selected/unavailable/unhealthy/error/timeout)
 */
export const providerAttemptsTotal = new promClient.Counter({
  name: 'messaging_provider_attempts_total',
  help: 'Provider selection attempts by outcome',
  labelNames: ['provider', 'outcome'],
});

// ============================================
// Message Flow Metrics
// ============================================

/**
 * Counter: messages accepted by the proxy
 * Labels: route (buffer/bus/redirect)
 */
export const messagesSentTotal = new promClient.Counter({
  name: 'messaging_messages_sent_total',
  help: 'Messages accepted by the proxy, by destination',
  labelNames: ['route'],
});

/**
 * Gauge: messages currently held in the pre-live buffer
 */
export const bufferedMessages = new promClient.Gauge({
  name: 'messaging_buffered_messages',
  help: 'Messages currently held in the pre-live buffer',
});

/**
 * Counter: buffered messages forwarded during drain
 * Labels: status (forwarded/failed)
 */
export const drainedMessagesTotal = new promClient.Counter({
  name: 'messaging_drained_messages_total',
  help: 'Buffered messages handled during drain',
  labelNames: ['status'],
});

/**
 * Counter: sends that reached the buffer after it stopped accepting
 */
export const lifecycleViolationsTotal = new promClient.Counter({
  name: 'messaging_lifecycle_violations_total',
  help: 'Sends rejected by a closed buffer and redirected to the bus',
});

// ============================================
// Consumer Metrics
// ============================================

/**
 * Counter: consumer bindings
 * Labels: status (bound/failed)
 */
export const consumerBindingsTotal = new promClient.Counter({
  name: 'messaging_consumer_bindings_total',
  help: 'Consumer bindings attempted against the live bus',
  labelNames: ['status'],
});

/**
 * Get all metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}
