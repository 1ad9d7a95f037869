/**
 * Request Isolation Module
 */

export {
  SharedStateStore,
  DEFAULT_SLOTS,
  captureSharedState,
  restoreSharedState,
  resetSharedState,
  isSharedRecord,
  type SharedStatePolicy,
  type SharedStateSnapshot,
} from './shared-state.js';
export {
  RequestIsolation,
  DEFAULT_SHARED_STATE_POLICY,
  type RequestIsolationEvents,
  type RequestIsolationOptions,
} from './request-isolation.js';
export { withIsolation } from './with-isolation.js';
