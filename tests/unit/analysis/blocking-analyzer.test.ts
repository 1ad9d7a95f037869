import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import { BlockingCodeAnalyzer } from '../../../src/analysis/blocking-analyzer.js';

describe('BlockingCodeAnalyzer', () => {
  let analyzer: BlockingCodeAnalyzer;
  let dir: string;

  beforeAll(() => {
    analyzer = new BlockingCodeAnalyzer();
    dir = mkdtempSync(join(tmpdir(), 'blocking-analyzer-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('scan', () => {
    it('reports synchronous file reads in a handler', () => {
      const report = analyzer.scan(
        [
          "import fs from 'node:fs';",
          '',
          'export async function handler(): Promise<string> {',
          "  const data = fs.readFileSync('/tmp/a.txt', 'utf8');",
          '  return data;',
          '}',
        ].join('\n'),
        'handler.ts'
      );

      expect(report.context).toBe('handler.ts');
      expect(report.error).toBeUndefined();
      expect(report.violations).toEqual([
        {
          kind: 'BlockingCall',
          severity: 'error',
          symbol: 'fs.readFileSync',
          location: { type: 'source', file: 'handler.ts', line: 4, column: 16 },
          message: 'Blocking call to fs.readFileSync halts the event loop',
          suggestion: 'Use fs/promises readFile()',
        },
      ]);
      expect(report.summary).toEqual({ total: 1, blocking: 1, warnings: 0, safe: false });
    });

    it('reports a clean source as safe', () => {
      const report = analyzer.scan(
        [
          "import { readFile } from 'node:fs/promises';",
          'export async function handler(path: string): Promise<string> {',
          "  return readFile(path, 'utf8');",
          '}',
        ].join('\n')
      );

      expect(report.context).toBe('<inline>');
      expect(report.violations).toEqual([]);
      expect(report.summary).toEqual({ total: 0, blocking: 0, warnings: 0, safe: true });
    });

    it('mixes errors and warnings in source order', () => {
      const report = analyzer.scan(
        [
          'const port = process.env.PORT;',
          "process.chdir('/srv');",
          'process.exit(1);',
          'globalThis.counter = 1;',
        ].join('\n')
      );

      expect(
        report.violations.map((violation) => [violation.kind, violation.severity, violation.symbol])
      ).toEqual([
        ['GlobalStateAccess', 'warning', 'process.env'],
        ['UnsafeCall', 'warning', 'process.chdir'],
        ['BlockingCall', 'error', 'process.exit'],
        ['GlobalStateAccess', 'warning', 'globalThis.counter'],
      ]);
      expect(report.violations[0]?.location).toEqual({
        type: 'source',
        file: '<inline>',
        line: 1,
        column: 14,
      });
      expect(report.violations[1]?.message).toBe('process.chdir changes state shared by every request');
      expect(report.summary).toEqual({ total: 4, blocking: 1, warnings: 3, safe: false });
    });

    it('reports blocking calls on required modules', () => {
      const report = analyzer.scan("require('child_process').execSync('ls');", 'task.js');

      expect(report.violations.map((violation) => violation.symbol)).toEqual(['execSync']);
    });

    it('returns a parse error instead of throwing', () => {
      const report = analyzer.scan(['const ok = 1;', 'const broken = ;'].join('\n'), 'broken.ts');

      expect(report.error).toMatch(/^Parse error: .+ \(line 2, column \d+\)$/);
      expect(report.violations).toEqual([]);
      expect(report.summary.total).toBe(0);
    });

    it('logs the parse error as an analysis error', () => {
      const lines: string[] = [];
      const logged = new BlockingCodeAnalyzer({
        logger: pino({ level: 'warn' }, { write: (line: string) => lines.push(line) }),
      });

      const report = logged.scan('const broken = ;', 'broken.ts');

      expect(lines).toHaveLength(1);
      const entry: unknown = JSON.parse(lines[0] ?? '{}');
      expect(entry).toMatchObject({
        context: 'broken.ts',
        msg: 'Blocking scan failed',
        error: { code: 'AnalysisError', message: report.error },
      });
    });

    it('uses custom operation tables', () => {
      const custom = new BlockingCodeAnalyzer({
        tables: {
          blocking: [{ name: 'db.querySync', suggestion: 'Use db.query()', matchAnyReceiver: false }],
          warning: [],
        },
      });

      const report = custom.scan("db.querySync('select 1');\nfs.readFileSync('x');");

      expect(report.violations.map((violation) => violation.symbol)).toEqual(['db.querySync']);
      expect(report.violations[0]?.suggestion).toBe('Use db.query()');
    });
  });

  describe('scanFile', () => {
    it('scans a file using its path as context', async () => {
      const path = join(dir, 'worker.js');
      writeFileSync(path, "const fs = require('fs');\nfs.writeFileSync('out.txt', 'done');\n");

      const report = await analyzer.scanFile(path);

      expect(report.context).toBe(path);
      expect(report.violations).toHaveLength(1);
      expect(report.violations[0]?.symbol).toBe('fs.writeFileSync');
      expect(report.violations[0]?.location).toEqual({ type: 'source', file: path, line: 2, column: 1 });
    });

    it('reports an unreadable file in the report', async () => {
      const path = join(dir, 'missing.ts');

      const report = await analyzer.scanFile(path);

      expect(report.context).toBe(path);
      expect(report.error).toMatch(/^Unable to read file: /);
      expect(report.violations).toEqual([]);
    });
  });
});
