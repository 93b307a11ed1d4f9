export type { TargetService } from './target-service.js';
export type { SourceDirectory, MembershipSource, MembershipDiagnostics } from './source.js';
