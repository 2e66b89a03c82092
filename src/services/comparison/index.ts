/**
 * Structural Comparison Module
 *
 * Normalization, path resolution, deep equality and drift
 * classification over ConfigValue trees.
 *
 * @module services/comparison
 */

export * from './normalizer.js';
export * from './path-resolver.js';
export * from './equality.js';
export * from './drift-classifier.js';
