/**
 * Global-State Policy Checker
 *
 * Text-level companion to the blocking analyzer. Matches a narrow pattern
 * table of shared-state access (globals, environment and locale mutation,
 * ambient session stores) against raw source, without parsing. Matches in
 * comments and strings are reported too.
 */

import type { Logger } from 'pino';
import type { BlockingViolation, ScanReport } from '../types/violations.js';
import { buildReport } from './report.js';

interface PolicyPattern {
  /** Global regular expression matched against the whole source */
  pattern: RegExp;
  symbol: (match: RegExpMatchArray) => string;
  message: string;
  suggestion: string;
}

const IDENT = '[A-Za-z_$][\\w$]*';
const QUOTED_KEY = `\\[\\s*['"\`]([^'"\`]+)['"\`]\\s*\\]`;
const ASSIGNMENT = '\\s*(?:\\|\\||&&|\\?\\?|[+-])?=(?!=)';

function envSymbol(match: RegExpMatchArray): string {
  const key = match[1] ?? match[2];
  return key ? `process.env.${key}` : 'process.env';
}

const POLICY_PATTERNS: readonly PolicyPattern[] = [
  {
    pattern: new RegExp(`\\bglobalThis\\s*(?:\\.\\s*(${IDENT})|\\[)`, 'g'),
    symbol: (match) => (match[1] ? `globalThis.${match[1]}` : 'globalThis[]'),
    message: 'Direct access to process-wide global object',
    suggestion: 'Read from the request object instead of ambient state',
  },
  {
    pattern: new RegExp(`(?<![\\w$.])global\\s*(?:\\.\\s*(${IDENT})|\\[)`, 'g'),
    symbol: (match) => (match[1] ? `global.${match[1]}` : 'global[]'),
    message: 'Direct access to process-wide global object',
    suggestion: 'Read from the request object instead of ambient state',
  },
  {
    pattern: new RegExp(`\\bprocess\\.env(?:\\.(${IDENT})|${QUOTED_KEY})?${ASSIGNMENT}`, 'g'),
    symbol: envSymbol,
    message: 'Environment mutation is visible to every request',
    suggestion: 'Pass request-specific values through the request context instead of process.env',
  },
  {
    pattern: new RegExp(`\\bdelete\\s+process\\.env(?:\\.(${IDENT})|${QUOTED_KEY})?`, 'g'),
    symbol: envSymbol,
    message: 'Environment mutation is visible to every request',
    suggestion: 'Pass request-specific values through the request context instead of process.env',
  },
  {
    pattern: /\bprocess\.chdir\s*\(/g,
    symbol: () => 'process.chdir',
    message: 'Working directory change is visible to every request',
    suggestion: 'Resolve absolute paths instead of changing the working directory',
  },
  {
    pattern: new RegExp(`\\b(${IDENT})\\.locale\\s*\\(\\s*['"\`]`, 'g'),
    symbol: (match) => `${match[1] ?? ''}.locale`,
    message: 'Locale mutation is visible to every request',
    suggestion: 'Pass the locale per call or use a request-scoped formatter',
  },
  {
    pattern: new RegExp(
      `\\b(Object|Array|String|Number|Boolean|Date|Function|Promise|RegExp|Map|Set)\\.prototype\\.(${IDENT})${ASSIGNMENT}`,
      'g'
    ),
    symbol: (match) => `${match[1] ?? ''}.prototype.${match[2] ?? ''}`,
    message: 'Built-in prototype mutation affects every request',
    suggestion: 'Use a standalone helper function instead of extending built-ins',
  },
  {
    pattern: /(?<![\w$.])session\s*\(\s*\{/g,
    symbol: () => 'session',
    message: 'Session middleware with the default in-memory store is shared by every request',
    suggestion: 'Configure an external session store',
  },
  {
    pattern: new RegExp(`\\bnew\\s+(?:${IDENT}\\.)?MemoryStore\\s*\\(`, 'g'),
    symbol: () => 'MemoryStore',
    message: 'In-memory session store grows with every session and is shared by every request',
    suggestion: 'Configure an external session store',
  },
];

/**
 * Offsets at which each line starts
 */
function lineStarts(source: string): number[] {
  const starts = [0];
  for (let index = 0; index < source.length; index++) {
    if (source.charCodeAt(index) === 10) {
      starts.push(index + 1);
    }
  }
  return starts;
}

function positionAt(starts: readonly number[], offset: number): { line: number; column: number } {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if ((starts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return { line: low + 1, column: offset - (starts[low] ?? 0) + 1 };
}

export interface GlobalStatePolicyCheckerOptions {
  logger?: Logger;
}

export class GlobalStatePolicyChecker {
  private readonly logger?: Logger;

  constructor(options: GlobalStatePolicyCheckerOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Report every shared-state access pattern in `sourceText`.
   */
  check(sourceText: string, contextLabel = '<inline>'): ScanReport {
    const starts = lineStarts(sourceText);
    const violations: BlockingViolation[] = [];

    for (const rule of POLICY_PATTERNS) {
      for (const match of sourceText.matchAll(rule.pattern)) {
        const { line, column } = positionAt(starts, match.index ?? 0);
        violations.push({
          kind: 'GlobalStateAccess',
          severity: 'warning',
          symbol: rule.symbol(match),
          location: { type: 'source', file: contextLabel, line, column },
          message: rule.message,
          suggestion: rule.suggestion,
        });
      }
    }

    const report = buildReport(contextLabel, violations);
    this.logger?.debug({ context: contextLabel, ...report.summary }, 'Policy check completed');
    return report;
  }
}
