/**
 * @flightlog/core
 * 
 * Core package containing:
 * - Error handling
 * - Task id validation and object key layout
 */

// Errors
export {
  FlightLogError,
  ValidationError,
  ConfigurationError,
  LogNotFoundError,
  StorageError,
} from './errors/index.js';

// Object keys
export {
  LOG_KEY_PREFIX,
  DEFAULT_TASK_ID,
  taskIdSchema,
  batchObjectKey,
  formObjectKey,
  type TaskId,
} from './keys.js';
