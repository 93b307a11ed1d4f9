export type { ISyncOrchestrator } from './sync-orchestrator.js';
