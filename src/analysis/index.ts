/**
 * Static Analysis Module
 */

export { BlockingCodeAnalyzer, type BlockingCodeAnalyzerOptions } from './blocking-analyzer.js';
export { BlockingVisitor, calleePath } from './blocking-visitor.js';
export {
  GlobalStatePolicyChecker,
  type GlobalStatePolicyCheckerOptions,
} from './global-state-policy.js';
export {
  loadOperationTables,
  matchOperation,
  entryMatches,
  type OperationMatch,
  type OperationTableName,
} from './operation-tables.js';
export { summarizeViolations, buildReport, errorReport } from './report.js';
