/**
 * Utilities - Export all utility functions
 */

export * from './dates';
export * from './formatting';
export * from './validation';
