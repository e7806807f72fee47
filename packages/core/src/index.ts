/**
 * @textrelay/core - Configuration and shared utilities for textrelay
 */

// Configuration
export * from './config/index.js';

// Utilities
export {
  sleep,
  abortable,
  abortReason,
  withDeadline,
  truncate,
  errorMessage,
  generateId,
  isPlainObject,
  deepFreeze,
  type DeadlineSignal,
} from './utils/index.js';
