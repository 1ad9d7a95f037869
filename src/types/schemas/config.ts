/**
 * Runtime Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml (snake_case) and the camelCase
 * option objects the components are constructed with. Threshold ordering
 * is enforced with cross-field refinements.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { DEFAULT_LOG_LEVEL, HEALTH } from '../../config/defaults.js';

/**
 * Memory Guard Configuration (runtime.yaml)
 */
export const MemoryGuardSectionSchema = z
  .object({
    gc_threshold_bytes: z.number().int().positive('must be positive'),
    warning_threshold_bytes: z.number().int().positive('must be positive'),
    critical_threshold_bytes: z.number().int().positive('must be positive'),
    check_interval_ms: z.number().int().positive('must be positive'),
    cache_check_interval_ms: z.number().int().positive('must be positive'),
    leak_detection_enabled: z.boolean(),
    leak_growth_bytes_per_minute: z.number().positive('must be positive'),
    snapshot_window_size: z.number().int().min(2, 'must be >= 2'),
    min_leak_samples: z.number().int().min(2, 'must be >= 2'),
    restart_delay_ms: z.number().int().min(0, 'must be >= 0'),
    cache_size_limits: z.object({
      default: z.number().int().positive('must be positive'),
    }),
  })
  .refine((data) => data.gc_threshold_bytes < data.warning_threshold_bytes, {
    message: 'must be greater than gc_threshold_bytes',
    path: ['warning_threshold_bytes'],
  })
  .refine((data) => data.warning_threshold_bytes < data.critical_threshold_bytes, {
    message: 'must be greater than warning_threshold_bytes',
    path: ['critical_threshold_bytes'],
  })
  .refine((data) => data.min_leak_samples <= data.snapshot_window_size, {
    message: 'must be <= snapshot_window_size',
    path: ['min_leak_samples'],
  });

/**
 * Runtime Blocking Sampler Configuration
 */
export const BlockingSamplerSectionSchema = z.object({
  enabled: z.boolean(),
  threshold_ms: z.number().positive('must be positive'),
  sampling_interval_ms: z.number().positive('must be positive'),
  max_consecutive_blocks: z.number().int(),
});

/**
 * Request Isolation Configuration
 */
export const RequestIsolationSectionSchema = z.object({
  max_context_duration_ms: z.number().int().positive('must be positive'),
  max_context_memory_growth_bytes: z.number().int().positive('must be positive').nullable(),
  leak_sweep_interval_ms: z.number().int().positive('must be positive'),
  server_allow_list: z.array(z.string().min(1)),
  env_allow_list: z.array(z.string().min(1)),
});

/**
 * Static Analyzer Configuration
 */
export const AnalyzerSectionSchema = z.object({
  policy_check: z.boolean(),
});

/**
 * Health Reporting Configuration (optional in runtime.yaml)
 */
export const HealthSectionSchema = z.object({
  max_alert_history: z.number().int().positive('must be positive').default(HEALTH.MAX_ALERT_HISTORY),
  status_window_ms: z.number().int().positive('must be positive').default(HEALTH.STATUS_WINDOW_MS),
  max_response_time_history: z
    .number()
    .int()
    .positive('must be positive')
    .default(HEALTH.MAX_RESPONSE_TIME_HISTORY),
  lag_check_interval_ms: z.number().int().positive('must be positive').default(HEALTH.LAG_CHECK_INTERVAL_MS),
});

/**
 * Logging Configuration (optional in runtime.yaml)
 */
export const LoggingSectionSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default(DEFAULT_LOG_LEVEL),
});

/**
 * Runtime Configuration Schema
 *
 * Defines the complete structure for runtime.yaml after environment
 * overrides have been merged in.
 */
export const RuntimeConfigSchema = z.object({
  memory_guard: MemoryGuardSectionSchema,
  blocking_sampler: BlockingSamplerSectionSchema,
  request_isolation: RequestIsolationSectionSchema,
  analyzer: AnalyzerSectionSchema,
  health: HealthSectionSchema.default({}),
  logging: LoggingSectionSchema.default({}),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

/**
 * Memory guard options as accepted by the MemoryGuard constructor
 */
export const MemoryGuardOptionsSchema = z
  .object({
    gcThresholdBytes: z.number().positive('must be positive'),
    warningThresholdBytes: z.number().positive('must be positive'),
    criticalThresholdBytes: z.number().positive('must be positive'),
    checkIntervalMs: z.number().positive('must be positive'),
    cacheCheckIntervalMs: z.number().positive('must be positive'),
    leakDetectionEnabled: z.boolean(),
    leakGrowthBytesPerMinute: z.number().positive('must be positive'),
    snapshotWindowSize: z.number().int().min(2, 'must be >= 2'),
    minLeakSamples: z.number().int().min(2, 'must be >= 2'),
    restartDelayMs: z.number().min(0, 'must be >= 0'),
    defaultCacheLimitBytes: z.number().positive('must be positive'),
  })
  .refine((data) => data.gcThresholdBytes < data.warningThresholdBytes, {
    message: 'must be greater than gcThresholdBytes',
    path: ['warningThresholdBytes'],
  })
  .refine((data) => data.warningThresholdBytes < data.criticalThresholdBytes, {
    message: 'must be greater than warningThresholdBytes',
    path: ['criticalThresholdBytes'],
  })
  .refine((data) => data.minLeakSamples <= data.snapshotWindowSize, {
    message: 'must be <= snapshotWindowSize',
    path: ['minLeakSamples'],
  });

/**
 * Request isolation options as accepted by the RequestIsolation constructor
 */
export const RequestIsolationOptionsSchema = z.object({
  maxContextDurationMs: z.number().positive('must be positive'),
  maxContextMemoryGrowthBytes: z.number().positive('must be positive').optional(),
  leakSweepIntervalMs: z.number().positive('must be positive'),
});
