export {
  wireGroupSchema,
  wireUserNameSchema,
  wireUserSchema,
  groupsPageSchema,
  usersPageSchema,
  groupMembersSchema,
  deleteGroupResponseSchema,
  addMemberResponseSchema,
  removeMemberResponseSchema,
  type WireGroup,
  type WireUser,
  type GroupsPage,
  type UsersPage,
  type GroupMembers,
} from './schemas.js';
