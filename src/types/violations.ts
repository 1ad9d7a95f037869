/**
 * Blocking Violation Types
 *
 * Shared shape for findings produced by the static analyzer, the
 * global-state policy checker and the runtime blocking sampler.
 *
 * @module types/violations
 */

/**
 * Category of a finding
 */
export type ViolationKind =
  | 'BlockingCall'
  | 'UnsafeCall'
  | 'GlobalStateAccess'
  | 'StaticMutableAccess'
  | 'UnboundedLoop';

export type ViolationSeverity = 'error' | 'warning';

/**
 * Position of a static finding in scanned source
 */
export interface SourceLocation {
  type: 'source';
  /** Context label passed to the scanner (usually a file path) */
  file: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

/**
 * Stack frame captured when the runtime sampler fires
 */
export interface FrameLocation {
  type: 'frame';
  file: string;
  line: number;
  functionName: string;
}

export type ViolationLocation = SourceLocation | FrameLocation;

/**
 * One finding. Never mutated after creation.
 */
export interface BlockingViolation {
  readonly kind: ViolationKind;
  readonly severity: ViolationSeverity;
  /** Offending function or variable */
  readonly symbol: string;
  readonly location: ViolationLocation;
  readonly message: string;
  readonly suggestion: string;
}

/**
 * Aggregated counts for a scan
 */
export interface ScanSummary {
  total: number;
  /** Violations with severity `error` */
  blocking: number;
  warnings: number;
  /** `blocking === 0` */
  safe: boolean;
}

/**
 * Result of scanning one unit of source.
 *
 * `error` is set when the source could not be read or parsed; in that case
 * `violations` is empty.
 */
export interface ScanReport {
  context: string;
  violations: readonly BlockingViolation[];
  summary: ScanSummary;
  error?: string;
}
