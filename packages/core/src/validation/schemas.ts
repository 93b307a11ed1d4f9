/**
 * Zod schemas for target directory service payloads.
 *
 * Responses are parsed, never cast: a payload that does not match is a
 * SCHEMA_MISMATCH, not a silently-undefined field further down.
 */

import { z } from 'zod';

/** Group as returned by the groups listing and by create/patch */
export const wireGroupSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  externalId: z.string().nullish(),
  label: z.string().nullish(),
  description: z.string().nullish(),
  membersCount: z.number().int().min(0).default(0),
});

export const wireUserNameSchema = z
  .object({
    first: z.string().nullish(),
    last: z.string().nullish(),
    middle: z.string().nullish(),
  })
  .partial();

/** User as returned by the users listing and the group members listing */
export const wireUserSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform((value) => String(value)),
  nickname: z.string(),
  aliases: z.array(z.string()).nullish().transform((value) => value ?? []),
  email: z.string().nullish(),
  name: wireUserNameSchema.nullish(),
  position: z.string().nullish(),
  departmentId: z.number().int().nullish(),
  isRobot: z.boolean().nullish(),
});

const paginationFields = {
  page: z.number().int().min(1).optional(),
  pages: z.number().int().min(0).default(1),
  perPage: z.number().int().min(1).optional(),
  total: z.number().int().min(0).optional(),
};

export const groupsPageSchema = z.object({
  groups: z.array(wireGroupSchema),
  ...paginationFields,
});

export const usersPageSchema = z.object({
  users: z.array(wireUserSchema),
  ...paginationFields,
});

const nestedMemberSchema = z.object({ id: z.number().int() }).passthrough();

export const groupMembersSchema = z.object({
  users: z.array(wireUserSchema).default([]),
  groups: z.array(nestedMemberSchema).default([]),
  departments: z.array(nestedMemberSchema).default([]),
});

export const deleteGroupResponseSchema = z.object({
  id: z.number().int().optional(),
  removed: z.boolean(),
});

export const addMemberResponseSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  type: z.string().optional(),
  added: z.boolean(),
});

export const removeMemberResponseSchema = z.object({
  deleted: z.boolean(),
});

export type WireGroup = z.infer<typeof wireGroupSchema>;
export type WireUser = z.infer<typeof wireUserSchema>;
export type GroupsPage = z.infer<typeof groupsPageSchema>;
export type UsersPage = z.infer<typeof usersPageSchema>;
export type GroupMembers = z.infer<typeof groupMembersSchema>;
