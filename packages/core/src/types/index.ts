export type {
  MemberType,
  SourceGroup,
  TargetGroup,
  TargetUserName,
  TargetUser,
  SourceMemberHandle,
  GroupPatch,
  CreateGroupPayload,
} from './record.js';

export type {
  RemoteResult,
  DeleteOutcome,
  AddMemberOutcome,
  RemoveMemberOutcome,
} from './result.js';
export { remoteOk, remoteFail } from './result.js';
