import { describe, expect, it, vi } from 'vitest';
import {
  ConnectorError,
  isSourceMemberHandle,
  remoteFail,
  remoteOk,
  type MembershipSource,
  type SourceDirectory,
  type SourceGroup,
  type TargetGroup,
  type TargetService,
  type TargetUser,
} from '@dirsync/core';
import { runSync, type PipelineDeps } from '../src/pipeline.js';

const SALES: SourceGroup = { stableId: 'G1', displayName: 'Sales', mail: 'sales@corp.example' };
const CREATED: TargetGroup = { id: 100, externalId: 'DDG;G1', name: 'Sales', label: 'sales', membersCount: 0 };
const ALICE: TargetUser = { id: 'u1', primaryHandle: 'alice', aliasHandles: [] };

const GROUPS_LINE = 'Groups: source=1 target=0 created=1 updated=0 unchanged=0 deleted=0 skipped=0 errors=0';

function fakeTarget() {
  return {
    listGroups: vi.fn<TargetService['listGroups']>().mockResolvedValue(remoteOk<TargetGroup[]>([])),
    listUsers: vi.fn<TargetService['listUsers']>().mockResolvedValue(remoteOk([ALICE])),
    listGroupMembers: vi.fn<TargetService['listGroupMembers']>().mockResolvedValue(remoteOk<TargetUser[]>([])),
    createGroup: vi.fn<TargetService['createGroup']>().mockResolvedValue(remoteOk(CREATED)),
    patchGroup: vi.fn<TargetService['patchGroup']>().mockResolvedValue(remoteOk(CREATED)),
    deleteGroup: vi.fn<TargetService['deleteGroup']>().mockResolvedValue(remoteOk({ removed: true })),
    addMember: vi.fn<TargetService['addMember']>().mockResolvedValue(remoteOk({ added: true })),
    removeMember: vi.fn<TargetService['removeMember']>().mockResolvedValue(remoteOk({ removed: true })),
    testConnection: vi.fn<TargetService['testConnection']>().mockResolvedValue(true),
  } satisfies TargetService;
}

function setup() {
  const target = fakeTarget();
  const source = {
    fetchGroups: vi.fn<SourceDirectory['fetchGroups']>().mockResolvedValue([SALES]),
  } satisfies SourceDirectory;
  const members = {
    fetchMemberHandles: vi
      .fn<MembershipSource['fetchMemberHandles']>()
      .mockResolvedValue(['alice'].filter(isSourceMemberHandle)),
  } satisfies MembershipSource;
  const lines: string[] = [];
  const deps: PipelineDeps = { target, source, members, print: (line) => lines.push(line) };
  return { target, source, members, lines, deps };
}

describe('runSync', () => {
  it('syncs groups, refetches them and then syncs membership', async () => {
    const { target, lines, deps } = setup();
    target.listGroups.mockResolvedValueOnce(remoteOk<TargetGroup[]>([])).mockResolvedValue(remoteOk([CREATED]));

    const outcome = await runSync(deps, { sync: { mutationDelayMs: 0 } });

    expect(outcome.exitCode).toBe(0);
    expect(target.createGroup).toHaveBeenCalledWith({ name: 'Sales', externalId: 'DDG;G1', label: 'sales' });
    expect(target.addMember).toHaveBeenCalledWith(100, 'user', 'u1');
    expect(target.listGroups).toHaveBeenCalledTimes(2);
    expect(target.listUsers).toHaveBeenCalledTimes(1);
    expect(lines).toEqual([
      'Sync summary',
      GROUPS_LINE,
      'Membership: groups=1 matched=1 added=1 removed=0 skipped=0 errors=0',
      'Result: ok',
    ]);
  });

  it('changes nothing in a dry run and does not refetch groups', async () => {
    const { target, lines, deps } = setup();

    const outcome = await runSync(deps, { sync: { dryRun: true } });

    expect(outcome.exitCode).toBe(0);
    expect(target.createGroup).not.toHaveBeenCalled();
    expect(target.listGroups).toHaveBeenCalledTimes(1);
    expect(lines).toEqual([
      'Sync summary (dry run, nothing was changed)',
      GROUPS_LINE,
      'Membership: aborted (empty-target-groups)',
      'Result: ok',
    ]);
  });

  it('stops before reading anything when the token is rejected', async () => {
    const { target, lines, deps } = setup();
    target.testConnection.mockResolvedValue(false);

    const outcome = await runSync(deps);

    expect(outcome).toEqual({ exitCode: 1, failure: 'target-unavailable', groups: undefined, membership: undefined });
    expect(target.listUsers).not.toHaveBeenCalled();
    expect(lines).toEqual([]);
  });

  it('fails on an unreadable or empty user list', async () => {
    const failing = setup();
    failing.target.listUsers.mockResolvedValue(
      remoteFail(new ConnectorError({ code: 'AUTHENTICATION_FAILED', message: 'bad token' }))
    );
    expect((await runSync(failing.deps)).failure).toBe('target-users');

    const empty = setup();
    empty.target.listUsers.mockResolvedValue(remoteOk<TargetUser[]>([]));
    expect((await runSync(empty.deps)).failure).toBe('empty-target-users');
    expect(empty.source.fetchGroups).not.toHaveBeenCalled();
  });

  it('fails when the source directory cannot be read or is empty', async () => {
    const failing = setup();
    failing.source.fetchGroups.mockRejectedValue(new ConnectorError({ code: 'READ_FAILED', message: 'LDAP search failed' }));
    expect(await runSync(failing.deps)).toMatchObject({ exitCode: 1, failure: 'source-groups' });

    const empty = setup();
    empty.source.fetchGroups.mockResolvedValue([]);
    expect(await runSync(empty.deps)).toMatchObject({ exitCode: 1, failure: 'empty-source-groups' });
    expect(empty.target.listGroups).not.toHaveBeenCalled();
  });

  it('fails when target groups cannot be listed', async () => {
    const { target, deps } = setup();
    target.listGroups.mockResolvedValue(remoteFail(new ConnectorError({ code: 'SERVER_ERROR', message: 'HTTP 503' })));

    expect(await runSync(deps)).toMatchObject({ exitCode: 1, failure: 'target-groups' });
    expect(target.createGroup).not.toHaveBeenCalled();
  });

  it('runs only the group phase when asked', async () => {
    const { target, lines, deps } = setup();

    const outcome = await runSync(deps, { phase: 'groups' });

    expect(outcome.exitCode).toBe(0);
    expect(outcome.membership).toBeUndefined();
    expect(target.listUsers).not.toHaveBeenCalled();
    expect(target.listGroups).toHaveBeenCalledTimes(1);
    expect(lines).toEqual(['Sync summary', GROUPS_LINE, 'Result: ok']);
  });

  it('exits with 2 after printing the summary when a phase reports errors', async () => {
    const { target, lines, deps } = setup();
    target.createGroup.mockResolvedValue(remoteFail(new ConnectorError({ code: 'WRITE_FAILED', message: 'HTTP 409' })));

    const outcome = await runSync(deps, { phase: 'groups' });

    expect(outcome.exitCode).toBe(2);
    expect(lines.at(-1)).toBe('Result: completed with errors');
  });

  it('runs only the membership phase when asked', async () => {
    const { target, deps } = setup();
    target.listGroups.mockResolvedValue(remoteOk([CREATED]));

    const outcome = await runSync(deps, { phase: 'membership' });

    expect(outcome.exitCode).toBe(0);
    expect(outcome.groups).toBeUndefined();
    expect(target.createGroup).not.toHaveBeenCalled();
    expect(target.addMember).toHaveBeenCalledWith(100, 'user', 'u1');
  });

  it('refetches users when the group phase outlives the cache', async () => {
    const { target, deps } = setup();
    let clock = new Date('2026-03-01T08:00:00Z');
    target.listGroups.mockResolvedValueOnce(remoteOk<TargetGroup[]>([])).mockResolvedValue(remoteOk([CREATED]));
    target.createGroup.mockImplementation(async () => {
      clock = new Date(clock.getTime() + 11 * 60 * 1000);
      return remoteOk(CREATED);
    });

    await runSync({ ...deps, now: () => clock }, { sync: { mutationDelayMs: 0 } });

    expect(target.listUsers).toHaveBeenCalledTimes(2);
  });
});
