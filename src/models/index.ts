// Export all domain models

export * from './config-value.js';
export * from './drift.js';
