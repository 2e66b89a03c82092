// Export all services

export * from './comparison/index.js';
export * from './config/config-service.js';
export * from './declared/index.js';
export * from './live/index.js';
export * from './metrics/index.js';
export * from './output/report-formatter.js';
export * from './runner/drift-runner.js';
export * from './storage/cache.js';
