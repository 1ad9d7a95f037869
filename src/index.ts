export { RuntimeSafety, createRuntimeSafety } from './api/runtime-safety.js';
export type { RuntimeSafetyEvents, RuntimeSafetyOptions } from './api/runtime-safety.js';
export {
  SafetyError,
  toSafetyError,
  zodErrorToSafetyError,
  formatZodIssues,
  type SafetyErrorCode,
  type SafetyErrorShape,
} from './api/errors.js';

// Static analysis
export * from './analysis/index.js';

// Cache monitoring
export * from './cache/index.js';

// Runtime monitoring
export * from './monitoring/index.js';

// Request isolation
export * from './isolation/index.js';

// Configuration
export {
  loadConfig,
  loadRawConfig,
  validateConfig,
  deepMerge,
  getDefaultConfigPath,
  getMemoryGuardConfig,
  getBlockingSamplerConfig,
  getHealthConfig,
  getRequestIsolationConfig,
  getSharedStatePolicy,
  type Config,
  type Environment,
} from './config/loader.js';
export * from './types/schemas/index.js';

// Utilities
export { createNodeScheduler, monotonicNow } from './utils/scheduler.js';
export { TimerGuard, MultiTimerGuard } from './utils/timer-guard.js';
export { formatBytes, formatUptime } from './utils/format.js';

export type * from './types/index.js';
