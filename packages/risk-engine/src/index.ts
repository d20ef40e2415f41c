// Schemas
export * from './schemas/index.js';

// Errors
export * from './errors.js';

// Metric catalog
export * from './catalog/index.js';

// Optional capabilities
export * from './features/index.js';

// Extractor adapter layer
export * from './extractors/index.js';

// Dynamic event ingestion
export * from './dynamic/index.js';

// Normalization and scoring
export * from './scoring/index.js';

// Rationale
export * from './rationale/index.js';

// Orchestration
export * from './pipeline/index.js';

// Utils
export * from './utils/index.js';
