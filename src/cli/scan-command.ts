/**
 * Blocking scan command
 *
 * Argument parsing, report formatting and exit code selection for the
 * `event-loop-guard-scan` binary.
 */

import { readFile } from 'node:fs/promises';
import { BlockingCodeAnalyzer } from '../analysis/blocking-analyzer.js';
import { GlobalStatePolicyChecker } from '../analysis/global-state-policy.js';
import { errorReport } from '../analysis/report.js';
import type { ScanReport } from '../types/violations.js';

export interface ScanArgs {
  files: string[];
  json: boolean;
  policy: boolean;
  help: boolean;
}

export interface ScanOutput {
  out(line: string): void;
  err(line: string): void;
}

export interface ScanDependencies {
  analyzer?: BlockingCodeAnalyzer;
  policyChecker?: GlobalStatePolicyChecker;
}

export const EXIT_OK = 0;
export const EXIT_UNSAFE = 1;
export const EXIT_ERROR = 2;

export const USAGE = `
Event loop guard - static scan for blocking and shared-state code

USAGE:
  event-loop-guard-scan <file...> [options]

OPTIONS:
  --json                                Print reports as JSON
  --policy                              Also run the global-state policy check
  --help                                Show this help message

EXIT CODES:
  0  no blocking violations
  1  at least one file contains blocking code
  2  a file could not be read or parsed
`;

export function parseScanArgs(args: readonly string[]): ScanArgs {
  const result: ScanArgs = { files: [], json: false, policy: false, help: false };

  for (const arg of args) {
    switch (arg) {
      case '--json':
        result.json = true;
        break;
      case '--policy':
        result.policy = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        result.files.push(arg);
    }
  }

  return result;
}

/**
 * Human readable lines for one report
 */
export function formatReport(report: ScanReport, label = 'blocking'): string[] {
  if (report.error) {
    return [`${report.context} [${label}]: ${report.error}`];
  }

  const { total, blocking, warnings } = report.summary;
  if (total === 0) {
    return [`${report.context} [${label}]: no violations`];
  }

  const lines = [
    `${report.context} [${label}]: ${total} violation(s), ${blocking} blocking, ${warnings} warning(s)`,
  ];
  for (const violation of report.violations) {
    const { location } = violation;
    const position =
      location.type === 'source' ? `${location.line}:${location.column}` : `${location.line}`;
    lines.push(`  ${position} ${violation.severity} ${violation.kind} ${violation.symbol}: ${violation.message}`);
    lines.push(`    suggestion: ${violation.suggestion}`);
  }
  return lines;
}

export function exitCodeFor(reports: readonly ScanReport[]): number {
  if (reports.some((report) => report.error !== undefined)) {
    return EXIT_ERROR;
  }
  return reports.every((report) => report.summary.safe) ? EXIT_OK : EXIT_UNSAFE;
}

/**
 * Scan every file named in `args`.
 *
 * @returns Process exit code
 */
export async function runScan(
  args: ScanArgs,
  output: ScanOutput,
  dependencies: ScanDependencies = {}
): Promise<number> {
  if (args.help) {
    output.out(USAGE);
    return EXIT_OK;
  }
  if (args.files.length === 0) {
    output.err('No files given');
    output.err(USAGE);
    return EXIT_ERROR;
  }

  const analyzer = dependencies.analyzer ?? new BlockingCodeAnalyzer();
  const policyChecker = dependencies.policyChecker ?? new GlobalStatePolicyChecker();
  const labelled: Array<{ label: string; report: ScanReport }> = [];

  for (const file of args.files) {
    let sourceText: string;
    try {
      sourceText = await readFile(file, 'utf8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      labelled.push({ label: 'blocking', report: errorReport(file, `Unable to read file: ${reason}`) });
      continue;
    }

    labelled.push({ label: 'blocking', report: analyzer.scan(sourceText, file) });
    if (args.policy) {
      labelled.push({ label: 'policy', report: policyChecker.check(sourceText, file) });
    }
  }

  const reports = labelled.map((entry) => entry.report);
  if (args.json) {
    output.out(JSON.stringify(reports, null, 2));
  } else {
    for (const { label, report } of labelled) {
      for (const line of formatReport(report, label)) {
        output.out(line);
      }
    }
  }

  return exitCodeFor(reports);
}
