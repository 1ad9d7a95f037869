/**
 * Monitoring Module
 *
 * Runtime blocking detection, memory guarding and health aggregation.
 */

export {
  RuntimeBlockingSampler,
  captureCallFrame,
  type BlockingSamplerOptions,
} from './blocking-sampler.js';

export {
  MemoryGuard,
  defaultMemoryGuardConfig,
  resolveMemoryGuardConfig,
  type CacheCleanReason,
  type CacheCleanedEvent,
  type MemoryGuardEvents,
  type MemoryGuardOptions,
} from './memory-guard.js';

export { ProcessMemoryProbe } from './memory-probe.js';

export {
  HealthReporter,
  type HealthAlert,
  type HealthAlertType,
  type EventLoopLagStats,
  type HealthCounters,
  type HealthReport,
  type HealthReporterEvents,
  type HealthReporterOptions,
  type HealthSources,
  type HealthStatus,
  type RequestCounters,
  type ResponseTimeStats,
} from './health-reporter.js';
