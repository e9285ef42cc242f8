/**
 * SIGNAL MODULE
 * =============
 *
 * Sub-signal evaluators, weighted decision engine, published cache and the
 * refresh coordinator that feeds it.
 */

export * from './contracts/source.types.js';
export * from './contracts/signal.types.js';
export * from './contracts/signal.config.js';
export * from './contracts/fetch.error.js';
export { evaluateSignals } from './evaluators/index.js';
export { DecisionEngine, scoreSignals } from './engine/decision.engine.js';
export { checkOddsValue, DEFAULT_MAX_SHARE_PRICE } from './engine/odds-value.js';
export { HistoryLog, DEFAULT_HISTORY_CAPACITY } from './runtime/history.log.js';
export { SignalCache } from './runtime/signal.cache.js';
export {
  RefreshCoordinator,
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_SOURCE_TIMEOUT_MS,
  type CycleOutcome,
  type CoordinatorStatus,
  type RefreshCoordinatorOptions,
} from './runtime/refresh.coordinator.js';
export { signalRoutes, type SignalRoutesOptions } from './api/signal.routes.js';
