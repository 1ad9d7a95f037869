/**
 * Operation Table Schemas
 *
 * Shape of config/operation-tables.json, the lookup tables the static
 * analyzer matches call expressions against.
 *
 * @module schemas/operation-tables
 */

import { z } from 'zod';

export const OperationEntrySchema = z.object({
  /** Dotted call path, e.g. "fs.readFileSync" or "Atomics.wait" */
  name: z.string().min(1, 'cannot be empty'),
  suggestion: z.string().min(1, 'cannot be empty'),
  /**
   * Match the last segment on any receiver (or a bare call). Only used for
   * names that are unambiguous on their own, such as `readFileSync`.
   */
  matchAnyReceiver: z.boolean().default(false),
});

export const OperationTablesSchema = z.object({
  blocking: z.array(OperationEntrySchema).min(1, 'must list at least one operation'),
  warning: z.array(OperationEntrySchema),
});

export type OperationEntry = z.infer<typeof OperationEntrySchema>;
export type OperationTables = z.infer<typeof OperationTablesSchema>;
