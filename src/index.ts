// infra-drift library entry point

export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/schemas.js';
export * from './models/index.js';
export * from './services/index.js';
