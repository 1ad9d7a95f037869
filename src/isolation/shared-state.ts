/**
 * Shared-State Snapshot
 *
 * Shared mutable state lives in an explicit, owned store of named slots
 * rather than in ambient globals. Snapshots are deep clones, frozen so a
 * backup cannot be modified through a reference that escaped.
 */

import { hostname } from 'node:os';
import type { SharedRecord, SharedValue } from '../types/isolation.js';

/**
 * Slots every store starts with
 */
export const DEFAULT_SLOTS = ['query', 'body', 'cookies', 'files', 'session', 'server', 'env'] as const;

/**
 * Which long-lived facts survive a reset
 */
export interface SharedStatePolicy {
  serverAllowList: readonly string[];
  envAllowList: readonly string[];
}

/**
 * Frozen deep copy of every slot
 */
export type SharedStateSnapshot = Readonly<Record<string, SharedValue>>;

export function isSharedRecord(value: SharedValue | undefined): value is SharedRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function pick(record: SharedValue | undefined, allowList: readonly string[]): SharedRecord {
  const picked: SharedRecord = {};
  if (!isSharedRecord(record)) {
    return picked;
  }
  for (const key of allowList) {
    const value = record[key];
    if (value !== undefined) {
      picked[key] = value;
    }
  }
  return picked;
}

export class SharedStateStore {
  private slots = new Map<string, SharedValue>();

  constructor(initial: SharedRecord = {}) {
    for (const slot of DEFAULT_SLOTS) {
      this.slots.set(slot, {});
    }
    for (const [slot, value] of Object.entries(initial)) {
      this.slots.set(slot, structuredClone(value));
    }
  }

  /**
   * Store seeded once from the running process: `env` from process.env,
   * `server` from process facts. Nothing else reads ambient state.
   */
  static fromProcess(): SharedStateStore {
    const env: SharedRecord = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) {
        env[key] = value;
      }
    }

    const server: SharedRecord = {
      SERVER_SOFTWARE: `node/${process.version}`,
      SERVER_PROTOCOL: 'HTTP/1.1',
      SERVER_NAME: hostname(),
      DOCUMENT_ROOT: process.cwd(),
      SCRIPT_NAME: process.argv[1] ?? '',
      REQUEST_TIME: Math.floor(Date.now() / 1000),
    };

    return new SharedStateStore({ env, server });
  }

  get(slot: string): SharedValue | undefined {
    return this.slots.get(slot);
  }

  set(slot: string, value: SharedValue): void {
    this.slots.set(slot, value);
  }

  delete(slot: string): boolean {
    return this.slots.delete(slot);
  }

  has(slot: string): boolean {
    return this.slots.has(slot);
  }

  keys(): string[] {
    return Array.from(this.slots.keys());
  }

  /**
   * Read one key of a record slot
   */
  getEntry(slot: string, key: string): SharedValue | undefined {
    const record = this.slots.get(slot);
    return isSharedRecord(record) ? record[key] : undefined;
  }

  /**
   * Write one key of a record slot. A slot holding a non-record value is
   * replaced by a fresh record.
   */
  setEntry(slot: string, key: string, value: SharedValue): void {
    const record = this.slots.get(slot);
    if (isSharedRecord(record)) {
      record[key] = value;
    } else {
      this.slots.set(slot, { [key]: value });
    }
  }

  /**
   * Plain object view of every slot (not a copy)
   */
  toRecord(): SharedRecord {
    return Object.fromEntries(this.slots);
  }

  /**
   * Replace every slot with `record`. Slots not in `record` are removed.
   */
  replaceAll(record: SharedRecord): void {
    this.slots = new Map(Object.entries(record));
  }
}

/**
 * Deep copy of every slot, frozen
 */
export function captureSharedState(store: SharedStateStore): SharedStateSnapshot {
  return deepFreeze(structuredClone(store.toRecord()));
}

/**
 * Put the store back exactly as captured. Slots added since are removed;
 * the store receives a fresh copy so the snapshot stays reusable.
 */
export function restoreSharedState(store: SharedStateStore, snapshot: SharedStateSnapshot): void {
  store.replaceAll(structuredClone({ ...snapshot }));
}

/**
 * Reset to the minimal state a new request starts from: every slot
 * emptied, except allow-listed `server` and `env` keys.
 */
export function resetSharedState(store: SharedStateStore, policy: SharedStatePolicy): void {
  const server = pick(store.get('server'), policy.serverAllowList);
  const env = pick(store.get('env'), policy.envAllowList);

  const reset: SharedRecord = {};
  for (const slot of store.keys()) {
    reset[slot] = {};
  }
  reset.server = server;
  reset.env = env;

  store.replaceAll(reset);
}
