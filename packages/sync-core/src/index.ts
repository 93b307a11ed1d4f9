/**
 * @dirsync/sync-core
 *
 * Reconciliation engine: correlation, field diff, alias index,
 * membership reconciliation and the sync orchestrator
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Correlation
export * from './correlation/index.js';

// Field diff
export * from './diff/index.js';

// Alias index
export * from './alias/index.js';

// Membership
export * from './membership/index.js';

// Orchestrator
export * from './orchestrator/index.js';

// Snapshot cache
export * from './cache/index.js';

// Formatters
export * from './formatters/index.js';
