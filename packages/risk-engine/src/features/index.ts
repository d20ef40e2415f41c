export * from './featureAvailability.js';
