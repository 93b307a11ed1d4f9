import { describe, expect, it } from 'vitest';
import type { SourceGroup, TargetGroup } from '@dirsync/core';
import { buildCreatePayload, correlateGroups, diffGroup, formatSyncKey, isEmptyPatch, parseSyncKey } from '../src/index.js';

describe('parseSyncKey', () => {
  it('classifies external ids', () => {
    expect(parseSyncKey('DDG;{6f1d}', 'DDG')).toEqual({ kind: 'tagged', prefix: 'DDG', stableId: '{6f1d}' });
    expect(parseSyncKey('DDG;a;b', 'DDG')).toEqual({ kind: 'tagged', prefix: 'DDG', stableId: 'a;b' });
    expect(parseSyncKey('DDG', 'DDG')).toEqual({ kind: 'malformed', prefix: 'DDG', raw: 'DDG' });
    expect(parseSyncKey('DDG;', 'DDG')).toEqual({ kind: 'malformed', prefix: 'DDG', raw: 'DDG;' });
    expect(parseSyncKey('DDGX;1', 'DDG')).toEqual({ kind: 'foreign', raw: 'DDGX;1' });
    expect(parseSyncKey('ddg;1', 'DDG')).toEqual({ kind: 'foreign', raw: 'ddg;1' });
    expect(parseSyncKey(undefined, 'DDG')).toEqual({ kind: 'foreign', raw: '' });
  });

  it('reads back what it formats', () => {
    expect(parseSyncKey(formatSyncKey('TEAM', 'G1'), 'TEAM')).toEqual({ kind: 'tagged', prefix: 'TEAM', stableId: 'G1' });
  });
});

describe('correlateGroups', () => {
  const sources: SourceGroup[] = [
    { stableId: 'G1', displayName: 'Sales', mail: 'sales@corp.example' },
    { stableId: 'G2', displayName: 'No mail' },
  ];
  const g = (id: number, externalId?: string): TargetGroup => ({ id, externalId, name: `group ${id}`, membersCount: 0 });

  it('splits target groups into pairs, orphans, malformed and duplicates', () => {
    const correlation = correlateGroups(
      sources,
      [g(1, 'DDG;G1'), g(2, 'DDG;G1'), g(3, 'DDG;G2'), g(4, 'DDG;G5'), g(5, 'DDG'), g(6), g(7, 'HR;G1')],
      'DDG'
    );

    expect([...correlation.pairs.entries()].map(([id, t]) => [id, t.id])).toEqual([
      ['G1', 1],
      ['G2', 3],
    ]);
    expect(correlation.orphans.map((t) => t.id)).toEqual([4]);
    expect(correlation.malformed.map((t) => t.id)).toEqual([5]);
    expect(correlation.duplicates.map((t) => t.id)).toEqual([2]);
  });
});

describe('diffGroup', () => {
  const source: SourceGroup = { stableId: 'G1', displayName: 'Sales', mail: 'Sales.Team@corp.example' };

  it('returns an empty patch for a converged group', () => {
    const patch = diffGroup(source, { id: 1, name: 'Sales', label: 'Sales.Team', membersCount: 0 });

    expect(patch).toEqual({});
    expect(isEmptyPatch(patch)).toBe(true);
  });

  it('patches only the fields that differ', () => {
    const patch = diffGroup(
      { ...source, description: 'EMEA' },
      { id: 1, name: 'Sales old', label: 'Sales.Team', description: '', membersCount: 0 }
    );

    expect(patch).toEqual({ name: 'Sales', description: 'EMEA' });
  });

  it('leaves the label alone when the source has no mail', () => {
    const patch = diffGroup({ stableId: 'G1', displayName: 'Sales' }, { id: 1, name: 'Sales', label: 'custom', membersCount: 0 });

    expect(isEmptyPatch(patch)).toBe(true);
  });

  it('clears a description removed at the source', () => {
    expect(diffGroup(source, { id: 1, name: 'Sales', label: 'Sales.Team', description: 'old', membersCount: 0 })).toEqual({
      description: '',
    });
  });
});

describe('buildCreatePayload', () => {
  it('tags the group and derives the label from the mail address', () => {
    expect(
      buildCreatePayload({ stableId: 'G1', displayName: 'Sales', mail: 'sales@x', description: 'EMEA' }, 'DDG')
    ).toEqual({ name: 'Sales', externalId: 'DDG;G1', label: 'sales', description: 'EMEA' });
  });
});
