/**
 * Operation Tables
 *
 * Loads the blocking/warning lookup tables from
 * config/operation-tables.json and matches dotted call paths against them.
 */

import { readFileSync } from 'node:fs';
import { SafetyError, zodErrorToSafetyError } from '../api/errors.js';
import {
  OperationTablesSchema,
  type OperationEntry,
  type OperationTables,
} from '../types/schemas/operation-tables.js';

export type OperationTableName = 'blocking' | 'warning';

export interface OperationMatch {
  table: OperationTableName;
  entry: OperationEntry;
}

const DEFAULT_TABLES_URL = new URL('../../config/operation-tables.json', import.meta.url);

/**
 * Read and validate an operation table file.
 *
 * @throws {SafetyError} ConfigurationError when the file is missing,
 * not JSON, or does not match the schema
 */
export function loadOperationTables(source: string | URL = DEFAULT_TABLES_URL): OperationTables {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SafetyError('ConfigurationError', `Failed to load operation tables: ${reason}`, {
      path: String(source),
    });
  }

  const result = OperationTablesSchema.safeParse(raw);
  if (!result.success) {
    throw zodErrorToSafetyError(result.error, 'ConfigurationError', 'Invalid operation tables');
  }
  return result.data;
}

function lastSegment(name: string): string {
  const index = name.lastIndexOf('.');
  return index === -1 ? name : name.slice(index + 1);
}

/**
 * Whether a call path (e.g. `['globalThis', 'process', 'exit']`) names
 * the entry's operation.
 */
export function entryMatches(entry: OperationEntry, segments: readonly string[]): boolean {
  if (segments.length === 0) {
    return false;
  }

  const path = segments.join('.');
  if (path === entry.name || path.endsWith(`.${entry.name}`)) {
    return true;
  }

  return entry.matchAnyReceiver && segments[segments.length - 1] === lastSegment(entry.name);
}

/**
 * Find the operation a call path refers to. The blocking table wins over
 * the warning table.
 */
export function matchOperation(
  tables: OperationTables,
  segments: readonly string[]
): OperationMatch | undefined {
  const blocking = tables.blocking.find((entry) => entryMatches(entry, segments));
  if (blocking) {
    return { table: 'blocking', entry: blocking };
  }

  const warning = tables.warning.find((entry) => entryMatches(entry, segments));
  if (warning) {
    return { table: 'warning', entry: warning };
  }

  return undefined;
}
