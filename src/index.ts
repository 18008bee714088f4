// Main export file - re-exports the public API

// Core layer exports
export * from './core/index.js';

// GSS-API port and backend exports
export * from './gssapi/index.js';

// Configuration exports
export * from './config/index.js';

// Utility exports
export * from './utils/errors.js';
export { SystemClock, FixedClock, type Clock } from './utils/clock.js';
