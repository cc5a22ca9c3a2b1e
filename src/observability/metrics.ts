import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'campaign-custody' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

/**
 * Total HTTP requests counter
 */
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

/**
 * HTTP request duration histogram
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Rail Metrics
// ============================================

/**
 * Rail calls by classified outcome (confirmed, rejected, indeterminate)
 */
export const railCallsTotal = new Counter({
  name: 'rail_calls_total',
  help: 'External ledger transfer calls by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const railCallDuration = new Histogram({
  name: 'rail_call_duration_seconds',
  help: 'External ledger transfer call duration in seconds',
  labelNames: ['outcome'] as const,
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

// ============================================
// Transfer Metrics
// ============================================

/**
 * Transfers by kind and terminal status
 */
export const transfersTotal = new Counter({
  name: 'transfers_total',
  help: 'Transfers by kind and terminal status',
  labelNames: ['kind', 'status'] as const,
  registers: [registry],
});

/**
 * Requests refused because the target entity was locked by an in-flight transfer
 */
export const entityLockContentionTotal = new Counter({
  name: 'entity_lock_contention_total',
  help: 'Requests refused because an entity was locked',
  labelNames: ['entity_type'] as const,
  registers: [registry],
});

export const entityLocksHeld = new Gauge({
  name: 'entity_locks_held',
  help: 'Entity locks currently held by in-flight transfers',
  registers: [registry],
});

/**
 * Transfers whose rail outcome is unknown and await manual reconciliation
 */
export const unreconciledTransfers = new Gauge({
  name: 'unreconciled_transfers',
  help: 'Transfers awaiting manual reconciliation',
  registers: [registry],
});

// ============================================
// Persistence Metrics
// ============================================

export const snapshotWritesTotal = new Counter({
  name: 'snapshot_writes_total',
  help: 'Custody snapshot writes by result',
  labelNames: ['result'] as const, // success, failure
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

/**
 * Get content type for metrics response
 */
export const getMetricsContentType = (): string => {
  return registry.contentType;
};
