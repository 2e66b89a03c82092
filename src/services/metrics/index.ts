/**
 * Metrics Service Module
 *
 * Counters and histograms for API calls and drift checks,
 * exportable as JSON or Prometheus text.
 *
 * @module services/metrics
 */

export * from './metrics-service.js';
