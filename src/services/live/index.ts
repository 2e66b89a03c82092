/**
 * Live Configuration Module
 *
 * @module services/live
 */

export * from './live-fetcher.js';
export * from './ec2-api.js';
export * from './ec2-fetcher.js';
export * from './retry.js';
