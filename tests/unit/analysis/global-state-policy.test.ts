import { describe, it, expect } from 'vitest';
import { GlobalStatePolicyChecker } from '../../../src/analysis/global-state-policy.js';
import type { ScanReport } from '../../../src/types/violations.js';

const checker = new GlobalStatePolicyChecker();

function symbolsAt(report: ScanReport): string[] {
  return report.violations.map((violation) =>
    violation.location.type === 'source'
      ? `${violation.symbol}@${violation.location.line}:${violation.location.column}`
      : violation.symbol
  );
}

describe('GlobalStatePolicyChecker', () => {
  it('reports each shared-state pattern with its position', () => {
    const report = checker.check(
      [
        "process.env.API_URL = 'http://localhost';",
        "const mode = process.env.NODE_ENV === 'production';",
        "delete process.env['DEBUG'];",
        "moment.locale('fr');",
        'Array.prototype.last = function () { return 1; };',
        "app.use(session({ secret: 'test-secret' }));",
        'const store = new session.MemoryStore();',
        'globalThis.cache = {};',
        "process.chdir('/srv');",
      ].join('\n'),
      'app.js'
    );

    expect(symbolsAt(report)).toEqual([
      'process.env.API_URL@1:1',
      'process.env.DEBUG@3:1',
      'moment.locale@4:1',
      'Array.prototype.last@5:1',
      'session@6:9',
      'MemoryStore@7:15',
      'globalThis.cache@8:1',
      'process.chdir@9:1',
    ]);
    expect(report.summary).toEqual({ total: 8, blocking: 0, warnings: 8, safe: true });
    expect(report.violations.every((violation) => violation.kind === 'GlobalStateAccess')).toBe(true);
  });

  it('uses the context label as the location file', () => {
    const [violation] = checker.check('global.flag = true;', 'server.js').violations;

    expect(violation).toEqual({
      kind: 'GlobalStateAccess',
      severity: 'warning',
      symbol: 'global.flag',
      location: { type: 'source', file: 'server.js', line: 1, column: 1 },
      message: 'Direct access to process-wide global object',
      suggestion: 'Read from the request object instead of ambient state',
    });
  });

  it('treats compound assignment as environment mutation', () => {
    const report = checker.check("process.env.COUNT += '1';\nprocess.env.MODE ||= 'dev';");

    expect(symbolsAt(report)).toEqual(['process.env.COUNT@1:1', 'process.env.MODE@2:1']);
  });

  it('ignores comparisons and member names that only look global', () => {
    const report = checker.check(
      [
        "if (process.env.NODE_ENV == 'test') {}",
        'const value = config.global.size;',
        "const formatted = date.toLocaleString('fr');",
      ].join('\n')
    );

    expect(report.violations).toEqual([]);
  });

  it('reports bracket access on the global objects', () => {
    const report = checker.check("  globalThis['key'] = 1;\n  global['key'] = 2;");

    expect(symbolsAt(report)).toEqual(['globalThis[]@1:3', 'global[]@2:3']);
  });
});
