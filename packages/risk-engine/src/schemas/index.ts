export * from './extractors.js';
export * from './metric.js';
export * from './event.js';
export * from './scoring.js';
export * from './assessment.js';
export * from './job.js';
