// ============================================================================
// @armory/core — Public API
// ============================================================================

// Items
export { createItem, efficiency } from './item.js';
export type { Item } from './item.js';

// Collections
export { sumItems, filterItems } from './collection.js';
export type { ItemTotals } from './collection.js';

// Errors
export {
  ArmoryError,
  ItemValidationError,
  ConfigError,
  SubsetLimitExceededError,
  DatabaseLoadError,
} from './errors.js';

// Logging
export {
  debug,
  info,
  warn,
  error,
  Timer,
  timer,
  onLog,
  logSolve,
  logLoad,
  levelFromEnv,
  setLogLevel,
} from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';
