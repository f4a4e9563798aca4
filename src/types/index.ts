/**
 * Workday Ledger - Type Definitions
 */

export * from './ledger.js';
export * from './config.js';
