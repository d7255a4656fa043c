/**
 * Main export for @finledger/shared package
 * Provides validation schemas, billing calculations and constants
 */

export * from './constants';
export * from './schemas';
export * from './billing';
