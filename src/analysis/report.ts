/**
 * Scan report assembly shared by the blocking analyzer and the
 * global-state policy checker.
 */

import type { BlockingViolation, ScanReport, ScanSummary } from '../types/violations.js';

export function summarizeViolations(violations: readonly BlockingViolation[]): ScanSummary {
  const blocking = violations.filter((violation) => violation.severity === 'error').length;

  return {
    total: violations.length,
    blocking,
    warnings: violations.length - blocking,
    safe: blocking === 0,
  };
}

/**
 * Order findings by position so reports read top to bottom
 */
function byLocation(a: BlockingViolation, b: BlockingViolation): number {
  if (a.location.line !== b.location.line) {
    return a.location.line - b.location.line;
  }
  if (a.location.type === 'source' && b.location.type === 'source') {
    return a.location.column - b.location.column;
  }
  return 0;
}

export function buildReport(context: string, violations: readonly BlockingViolation[]): ScanReport {
  const ordered = [...violations].sort(byLocation);

  return {
    context,
    violations: ordered,
    summary: summarizeViolations(ordered),
  };
}

/**
 * Report for source that could not be read or parsed
 */
export function errorReport(context: string, error: string): ScanReport {
  return {
    context,
    violations: [],
    summary: summarizeViolations([]),
    error,
  };
}
