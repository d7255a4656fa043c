/**
 * Export all Zod validation schemas
 */

export * from './common';
export * from './obligation';
export * from './invoice';
export * from './payment';
export * from './summary';
