/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 * and converts the snake_case sections into component options.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { SafetyError, formatZodIssues } from '../api/errors.js';
import { RuntimeConfigSchema, type RuntimeConfig } from '../types/schemas/config.js';
import type { MemoryGuardConfig } from '../types/memory.js';
import type { RequestIsolationConfig } from '../types/isolation.js';
import type { SharedStatePolicy } from '../isolation/shared-state.js';

/**
 * Validated configuration (matches runtime.yaml structure)
 */
export type Config = RuntimeConfig;

export type Environment = 'production' | 'development' | 'test';

type PlainRecord = Record<string, unknown>;

function isPlainRecord(value: unknown): value is PlainRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Arrays and scalars from `source` replace
 * those in `target`.
 */
export function deepMerge(target: PlainRecord, source: PlainRecord): PlainRecord {
  const output: PlainRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainRecord(sourceValue) && isPlainRecord(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Default location of runtime.yaml inside the installed package
 */
export function getDefaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'runtime.yaml');
}

function resolveEnvironment(environment?: Environment): Environment {
  if (environment) {
    return environment;
  }
  const fromEnv = process.env.NODE_ENV;
  return fromEnv === 'production' || fromEnv === 'test' ? fromEnv : 'development';
}

/**
 * Read runtime.yaml and merge the selected environment's overrides.
 * The result is not validated yet.
 */
export function loadRawConfig(configPath?: string, environment?: Environment): PlainRecord {
  const finalPath = configPath ?? getDefaultConfigPath();

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(finalPath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new SafetyError(
        'ConfigurationError',
        `Configuration file not found: ${finalPath}. ` +
          'Please ensure config/runtime.yaml exists in the project root.',
        { path: finalPath }
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new SafetyError('ConfigurationError', `Failed to load configuration: ${reason}`, {
      path: finalPath,
    });
  }

  if (!isPlainRecord(parsed)) {
    throw new SafetyError('ConfigurationError', `Configuration root must be a mapping: ${finalPath}`, {
      path: finalPath,
    });
  }

  const { environments, ...base } = parsed;
  const env = resolveEnvironment(environment);
  const overrides = isPlainRecord(environments) ? environments[env] : undefined;

  return isPlainRecord(overrides) ? deepMerge(base, overrides) : base;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = RuntimeConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = formatZodIssues(parseResult.error);
    throw new SafetyError(
      'ConfigurationError',
      `Configuration validation failed:\n${errors.join('\n')}`,
      { issues: errors }
    );
  }
  return parseResult.data;
}

/**
 * Load and validate configuration from YAML file
 */
export function loadConfig(configPath?: string, environment?: Environment): Config {
  return validateConfig(loadRawConfig(configPath, environment));
}

/**
 * Convert the memory_guard section to MemoryGuard options
 */
export function getMemoryGuardConfig(config: Config): MemoryGuardConfig {
  const section = config.memory_guard;

  return {
    gcThresholdBytes: section.gc_threshold_bytes,
    warningThresholdBytes: section.warning_threshold_bytes,
    criticalThresholdBytes: section.critical_threshold_bytes,
    checkIntervalMs: section.check_interval_ms,
    cacheCheckIntervalMs: section.cache_check_interval_ms,
    leakDetectionEnabled: section.leak_detection_enabled,
    leakGrowthBytesPerMinute: section.leak_growth_bytes_per_minute,
    snapshotWindowSize: section.snapshot_window_size,
    minLeakSamples: section.min_leak_samples,
    restartDelayMs: section.restart_delay_ms,
    defaultCacheLimitBytes: section.cache_size_limits.default,
  };
}

/**
 * Convert the blocking_sampler section to sampler options
 */
export function getBlockingSamplerConfig(config: Config): {
  enabled: boolean;
  thresholdMs: number;
  samplingIntervalMs: number;
  maxConsecutiveBlocks: number;
} {
  const section = config.blocking_sampler;

  return {
    enabled: section.enabled,
    thresholdMs: section.threshold_ms,
    samplingIntervalMs: section.sampling_interval_ms,
    maxConsecutiveBlocks: section.max_consecutive_blocks,
  };
}

/**
 * Convert the request_isolation section to isolation options
 */
export function getRequestIsolationConfig(config: Config): RequestIsolationConfig {
  const section = config.request_isolation;

  return {
    maxContextDurationMs: section.max_context_duration_ms,
    maxContextMemoryGrowthBytes: section.max_context_memory_growth_bytes ?? undefined,
    leakSweepIntervalMs: section.leak_sweep_interval_ms,
  };
}

/**
 * Convert the health section to health reporter options
 */
export function getHealthConfig(config: Config): {
  maxAlertHistory: number;
  statusWindowMs: number;
  maxResponseTimeHistory: number;
  lagCheckIntervalMs: number;
} {
  const section = config.health;

  return {
    maxAlertHistory: section.max_alert_history,
    statusWindowMs: section.status_window_ms,
    maxResponseTimeHistory: section.max_response_time_history,
    lagCheckIntervalMs: section.lag_check_interval_ms,
  };
}

/**
 * Convert the allow-lists to a shared-state reset policy
 */
export function getSharedStatePolicy(config: Config): SharedStatePolicy {
  return {
    serverAllowList: config.request_isolation.server_allow_list,
    envAllowList: config.request_isolation.env_allow_list,
  };
}
