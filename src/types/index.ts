/**
 * Type exports
 */

export * from './model.js';
