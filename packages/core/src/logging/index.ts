/**
 * Logging Module Public Exports
 */

export { Logger, logger, AuditEventType } from './logger.js';
export type { LogMetadata, LogLevel, LoggerOptions } from './logger.js';

export { consoleTransport } from './transports/console.transport.js';
export { fileTransport } from './transports/file.transport.js';
export { errorTransport } from './transports/error.transport.js';

export {
  getCorrelationId,
  getCorrelationContext,
  runWithCorrelationAsync,
  type CorrelationContext,
} from './context/correlation.js';

export { sanitizeLogData, sanitizeMetadata, sanitizeString } from './utils/sanitizer.js';
