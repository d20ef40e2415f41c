export * from './schema.js';
export { loadConfig } from './load.js';
export { createLogger, loggerOptions, type LogDestination } from './logger.js';
export { toScoringOverrides, type ScoringDefaultOverrides } from './scoring.js';
