// Config
export * from './config/index.js';

// Logging
export { Logger, getLogger, redactObject, type LogEntry, type LogLevel, type LoggerOptions } from './monitoring/logger.js';

// Session
export * from './session/index.js';

// Error detection and recovery
export * from './detection/index.js';
export * from './recovery/index.js';

// Forms
export * from './forms/index.js';

// Questions
export * from './questions/index.js';
