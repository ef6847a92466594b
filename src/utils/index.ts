/**
 * Utility exports
 */

// Logger
export {
  Logger,
  createLogger,
  setDebugMode,
  isDebugMode,
  isDebugEnvEnabled,
  type LogLevel,
  type LogEntry,
} from './logger.js';

// Error utilities
export {
  FrameBufferError,
  createFrameBufferError,
  unsupportedConversionError,
  invalidDimensionsError,
  invalidStateError,
  invalidHandleError,
  isFrameBufferError,
  errorMessage,
  type FrameBufferErrorName,
} from './errors.js';
