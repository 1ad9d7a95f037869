/**
 * Default Configuration Constants
 *
 * All magic numbers centralized here for easy tuning. The same values ship
 * in config/runtime.yaml; these are used when a component is constructed
 * directly without a loaded configuration.
 */

const MIB = 1024 * 1024;

/**
 * Memory Guard Configuration
 */
export const MEMORY_GUARD = {
  /** Trigger collection above this (bytes) */
  GC_THRESHOLD_BYTES: 100 * MIB,

  /** Shrink caches above this (bytes) */
  WARNING_THRESHOLD_BYTES: 200 * MIB,

  /** Clear caches and request a restart above this (bytes) */
  CRITICAL_THRESHOLD_BYTES: 300 * MIB,

  /** Memory sampling interval (ms) */
  CHECK_INTERVAL_MS: 10_000, // 10 seconds

  /** Cache size sweep interval (ms) */
  CACHE_CHECK_INTERVAL_MS: 2_000, // 2 seconds

  LEAK_DETECTION_ENABLED: true,

  /** Sustained growth reported as a leak */
  LEAK_GROWTH_BYTES_PER_MINUTE: 1 * MIB,

  /** Rolling window capacity: 10 minutes at the default interval */
  SNAPSHOT_WINDOW_SIZE: 60,

  /** 1 minute of history at the default interval */
  MIN_LEAK_SAMPLES: 6,

  /** Delay before the restart request fires (ms) */
  RESTART_DELAY_MS: 1_000,

  /** Per-cache limit when none is given (bytes) */
  DEFAULT_CACHE_LIMIT_BYTES: 10 * MIB,
} as const;

/**
 * Runtime Blocking Sampler Configuration
 */
export const BLOCKING_SAMPLER = {
  /** Elapsed time since last activity that counts as blocked (ms) */
  THRESHOLD_MS: 100,

  /** Sampling tick interval (ms) */
  SAMPLING_INTERVAL_MS: 10,

  /** Consecutive blocked samples before a violation fires */
  MAX_CONSECUTIVE_BLOCKS: 5,
} as const;

/**
 * Request Isolation Configuration
 */
export const REQUEST_ISOLATION = {
  /** Contexts older than this are reported as leaked (ms) */
  MAX_CONTEXT_DURATION_MS: 30_000, // 30 seconds

  /** Background leak sweep interval (ms) */
  LEAK_SWEEP_INTERVAL_MS: 10_000,

  /** Server facts kept when shared state is reset for a request */
  SERVER_ALLOW_LIST: [
    'SERVER_SOFTWARE',
    'SERVER_PROTOCOL',
    'SERVER_NAME',
    'SERVER_ADDR',
    'DOCUMENT_ROOT',
    'SCRIPT_NAME',
    'REQUEST_TIME',
  ],

  /** Environment variables kept when shared state is reset for a request */
  ENV_ALLOW_LIST: ['PATH', 'HOME', 'USER', 'LANG', 'LC_ALL', 'TZ', 'NODE_ENV'],
} as const;

/**
 * Health Reporting Configuration
 */
export const HEALTH = {
  /** Alerts kept for the health report */
  MAX_ALERT_HISTORY: 100,

  /** Alerts older than this no longer affect the status (ms) */
  STATUS_WINDOW_MS: 300_000, // 5 minutes

  /** Request durations kept for the response time figures */
  MAX_RESPONSE_TIME_HISTORY: 1_000,

  /** Event loop lag measurement interval (ms) */
  LAG_CHECK_INTERVAL_MS: 1_000,
} as const;

/**
 * Log level when runtime.yaml has no logging section
 */
export const DEFAULT_LOG_LEVEL = 'info';
