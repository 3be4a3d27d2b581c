import { Registry, collectDefaultMetrics } from 'prom-client';
import { getBuildVersion } from '../../utils/build-version.js';
import { INSTANCE_ID } from '../../config.js';

/**
 * Prometheus metrics registry.
 *
 * All metrics are registered here and exposed via the /metrics endpoint.
 * Default labels are applied to every metric.
 */
export const register = new Registry();

register.setDefaultLabels({
  service: 'knowledge-base',
  version: getBuildVersion(),
  instance: INSTANCE_ID
});

let processMetricsEnabled = false;

/**
 * Adds the prom-client process metrics (CPU, memory, event loop, GC).
 * Only the long-running HTTP server enables them.
 */
export function enableProcessMetrics(): void {
  if (processMetricsEnabled) return;
  processMetricsEnabled = true;
  collectDefaultMetrics({ register, prefix: 'kbase_' });
}
