/**
 * Static Blocking Analyzer
 *
 * Parses JavaScript/TypeScript source with the TypeScript compiler API and
 * reports operations that block the event loop or touch state shared by
 * every request. Advisory only: a source that cannot be read or parsed
 * yields a report with `error` set, never an exception.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import ts from 'typescript';
import type { Logger } from 'pino';
import { SafetyError, toSafetyError } from '../api/errors.js';
import type { ScanReport } from '../types/violations.js';
import type { OperationTables } from '../types/schemas/operation-tables.js';
import { loadOperationTables } from './operation-tables.js';
import { BlockingVisitor } from './blocking-visitor.js';
import { buildReport, errorReport } from './report.js';

export interface BlockingCodeAnalyzerOptions {
  /** Operation tables (defaults to config/operation-tables.json) */
  tables?: OperationTables;
  logger?: Logger;
}

const SOURCE_EXTENSIONS = new Set(['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs']);

/**
 * File name handed to the parser. Labels without a source extension
 * (`<inline>`, `handler`) are parsed as TypeScript.
 */
function parserFileName(contextLabel: string): string {
  return SOURCE_EXTENSIONS.has(extname(contextLabel).toLowerCase()) ? contextLabel : `${contextLabel}.ts`;
}

function describeDiagnostic(diagnostic: ts.Diagnostic): string {
  const text = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    return `${text} (line ${line + 1}, column ${character + 1})`;
  }
  return text;
}

function analysisError(prefix: string, error: unknown): SafetyError {
  const cause = toSafetyError(error, 'AnalysisError');
  return new SafetyError('AnalysisError', `${prefix}: ${cause.message}`, cause.details);
}

/**
 * First syntax error in `sourceText`, if any
 */
function findSyntaxError(sourceText: string, fileName: string): ts.Diagnostic | undefined {
  const { diagnostics = [] } = ts.transpileModule(sourceText, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: { allowJs: true },
  });

  return diagnostics.find(
    (diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error && diagnostic.file !== undefined
  );
}

export class BlockingCodeAnalyzer {
  private readonly tables: OperationTables;
  private readonly logger?: Logger;

  constructor(options: BlockingCodeAnalyzerOptions = {}) {
    this.tables = options.tables ?? loadOperationTables();
    this.logger = options.logger;
  }

  /**
   * Scan a unit of source text.
   *
   * @param contextLabel - Reported as the location's file (usually a path)
   */
  scan(sourceText: string, contextLabel = '<inline>'): ScanReport {
    const fileName = parserFileName(contextLabel);

    let sourceFile: ts.SourceFile;
    try {
      const syntaxError = findSyntaxError(sourceText, fileName);
      if (syntaxError) {
        return this.failed(
          contextLabel,
          new SafetyError('AnalysisError', `Parse error: ${describeDiagnostic(syntaxError)}`)
        );
      }
      sourceFile = ts.createSourceFile(fileName, sourceText, ts.ScriptTarget.Latest, true);
    } catch (error) {
      return this.failed(contextLabel, analysisError('Parse error', error));
    }

    try {
      const violations = new BlockingVisitor(sourceFile, contextLabel, this.tables).collect();
      const report = buildReport(contextLabel, violations);

      this.logger?.debug(
        { context: contextLabel, ...report.summary },
        'Blocking scan completed'
      );
      return report;
    } catch (error) {
      return this.failed(contextLabel, analysisError('Analysis failed', error));
    }
  }

  /**
   * Read a file and scan it. A missing or unreadable file is reported as
   * an error in the returned report.
   */
  async scanFile(path: string): Promise<ScanReport> {
    let sourceText: string;
    try {
      sourceText = await readFile(path, 'utf8');
    } catch (error) {
      return this.failed(path, analysisError('Unable to read file', error));
    }

    return this.scan(sourceText, path);
  }

  private failed(context: string, error: SafetyError): ScanReport {
    this.logger?.warn({ context, error: error.toObject() }, 'Blocking scan failed');
    return errorReport(context, error.message);
  }
}
