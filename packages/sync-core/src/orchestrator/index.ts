export { SyncOrchestrator, createSyncOrchestrator } from './sync-orchestrator.js';
export { MutationPacer } from './mutation-pacer.js';
export { createSyncStats, finishResult } from './stats.js';
