import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  deepMerge,
  getBlockingSamplerConfig,
  getHealthConfig,
  getMemoryGuardConfig,
  getRequestIsolationConfig,
  getSharedStatePolicy,
  loadConfig,
  loadRawConfig,
  validateConfig,
} from '../../../src/config/loader.js';
import { SafetyError } from '../../../src/api/errors.js';

const MIB = 1024 * 1024;

const validConfig = {
  memory_guard: {
    gc_threshold_bytes: 10 * MIB,
    warning_threshold_bytes: 20 * MIB,
    critical_threshold_bytes: 30 * MIB,
    check_interval_ms: 1000,
    cache_check_interval_ms: 500,
    leak_detection_enabled: true,
    leak_growth_bytes_per_minute: MIB,
    snapshot_window_size: 60,
    min_leak_samples: 6,
    restart_delay_ms: 1000,
    cache_size_limits: { default: 2 * MIB },
  },
  blocking_sampler: {
    enabled: true,
    threshold_ms: 100,
    sampling_interval_ms: 10,
    max_consecutive_blocks: 5,
  },
  request_isolation: {
    max_context_duration_ms: 30000,
    max_context_memory_growth_bytes: null,
    leak_sweep_interval_ms: 10000,
    server_allow_list: ['SERVER_NAME'],
    env_allow_list: ['PATH', 'TZ'],
  },
  analyzer: { policy_check: true },
  logging: { level: 'info' },
};

describe('Config Loader', () => {
  let testConfigDir: string;
  let testConfigPath: string;

  beforeEach(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'elg-config-'));
    testConfigPath = join(testConfigDir, 'runtime.yaml');
  });

  afterEach(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should load valid configuration from YAML file', () => {
      writeFileSync(testConfigPath, yaml.dump(validConfig));

      const config = loadConfig(testConfigPath, 'development');

      expect(config.memory_guard.gc_threshold_bytes).toBe(10 * MIB);
      expect(config.blocking_sampler.max_consecutive_blocks).toBe(5);
      expect(config.request_isolation.max_context_memory_growth_bytes).toBeNull();
    });

    it('should load the packaged runtime.yaml', () => {
      const config = loadConfig(undefined, 'development');

      expect(config.memory_guard.gc_threshold_bytes).toBe(104857600);
      expect(config.memory_guard.snapshot_window_size).toBe(60);
      expect(config.logging.level).toBe('debug');
    });

    it('should throw error for non-existent config file', () => {
      const nonExistentPath = join(testConfigDir, 'non-existent.yaml');

      expect(() => loadConfig(nonExistentPath)).toThrow('Configuration file not found');
      expect(() => loadConfig(nonExistentPath)).toThrow(nonExistentPath);
    });

    it('should throw error for invalid YAML syntax', () => {
      writeFileSync(testConfigPath, 'invalid: yaml: syntax: [[[');

      expect(() => loadConfig(testConfigPath)).toThrow('Failed to load configuration');
    });

    it('should reject a configuration root that is not a mapping', () => {
      writeFileSync(testConfigPath, '- a\n- b\n');

      expect(() => loadConfig(testConfigPath)).toThrow('Configuration root must be a mapping');
    });

    it('should apply environment-specific overrides (test)', () => {
      const config = loadConfig(undefined, 'test');

      expect(config.blocking_sampler.enabled).toBe(false);
      expect(config.memory_guard.check_interval_ms).toBe(3600000);
      expect(config.logging.level).toBe('silent');
      // Untouched values come from the base section
      expect(config.memory_guard.warning_threshold_bytes).toBe(209715200);
    });

    it('should apply environment-specific overrides (production)', () => {
      writeFileSync(
        testConfigPath,
        yaml.dump({
          ...validConfig,
          environments: {
            production: { logging: { level: 'warn' }, analyzer: { policy_check: false } },
          },
        })
      );

      const config = loadConfig(testConfigPath, 'production');

      expect(config.logging.level).toBe('warn');
      expect(config.analyzer.policy_check).toBe(false);
      expect(loadRawConfig(testConfigPath, 'production').environments).toBeUndefined();
    });
  });

  describe('validateConfig', () => {
    it('should reject non-increasing memory thresholds', () => {
      const invalid = {
        ...validConfig,
        memory_guard: { ...validConfig.memory_guard, warning_threshold_bytes: 5 * MIB },
      };

      expect(() => validateConfig(invalid)).toThrow(
        'memory_guard.warning_threshold_bytes must be greater than gc_threshold_bytes'
      );
    });

    it('should reject non-positive intervals', () => {
      const invalid = {
        ...validConfig,
        blocking_sampler: { ...validConfig.blocking_sampler, sampling_interval_ms: 0 },
      };

      expect(() => validateConfig(invalid)).toThrow('blocking_sampler.sampling_interval_ms must be positive');
    });

    it('should fill in the optional health and logging sections', () => {
      const { logging: _logging, ...withoutLogging } = validConfig;

      const config = validateConfig(withoutLogging);

      expect(config.logging.level).toBe('info');
      expect(getHealthConfig(config)).toEqual({
        maxAlertHistory: 100,
        statusWindowMs: 300000,
        maxResponseTimeHistory: 1000,
        lagCheckIntervalMs: 1000,
      });
    });

    it('should throw SafetyError with ConfigurationError code', () => {
      try {
        validateConfig({});
        expect.unreachable('validateConfig should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(SafetyError);
        expect(error).toMatchObject({ code: 'ConfigurationError' });
      }
    });
  });

  describe('converters', () => {
    it('should map memory_guard to camelCase options', () => {
      const config = validateConfig(validConfig);

      expect(getMemoryGuardConfig(config)).toEqual({
        gcThresholdBytes: 10 * MIB,
        warningThresholdBytes: 20 * MIB,
        criticalThresholdBytes: 30 * MIB,
        checkIntervalMs: 1000,
        cacheCheckIntervalMs: 500,
        leakDetectionEnabled: true,
        leakGrowthBytesPerMinute: MIB,
        snapshotWindowSize: 60,
        minLeakSamples: 6,
        restartDelayMs: 1000,
        defaultCacheLimitBytes: 2 * MIB,
      });
    });

    it('should map sampler, isolation and shared-state policy sections', () => {
      const config = validateConfig(validConfig);

      expect(getBlockingSamplerConfig(config)).toEqual({
        enabled: true,
        thresholdMs: 100,
        samplingIntervalMs: 10,
        maxConsecutiveBlocks: 5,
      });
      expect(getRequestIsolationConfig(config)).toEqual({
        maxContextDurationMs: 30000,
        maxContextMemoryGrowthBytes: undefined,
        leakSweepIntervalMs: 10000,
      });
      expect(getSharedStatePolicy(config)).toEqual({
        serverAllowList: ['SERVER_NAME'],
        envAllowList: ['PATH', 'TZ'],
      });
    });
  });

  describe('deepMerge', () => {
    it('should merge nested records and replace arrays', () => {
      const merged = deepMerge(
        { a: { b: 1, c: [1, 2] }, d: 'keep' },
        { a: { c: [3] }, e: true }
      );

      expect(merged).toEqual({ a: { b: 1, c: [3] }, d: 'keep', e: true });
    });
  });
});
