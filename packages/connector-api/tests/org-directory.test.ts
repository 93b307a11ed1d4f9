import { afterEach, describe, expect, it, vi } from 'vitest';
import { OrgDirectoryConnector } from '../src/org-directory/connector.js';

type Route = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', 'x-request-id': 'req-1' },
  });
}

function stubFetch(route: Route) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    return route(url, init);
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function createConnector(overrides: { minUserId?: number; sleeps?: number[] } = {}) {
  const sleeps = overrides.sleeps ?? [];
  return new OrgDirectoryConnector({
    orgId: '42',
    token: 'test-secret',
    baseUrl: 'https://directory.test',
    minUserId: overrides.minUserId,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OrgDirectoryConnector', () => {
  it('reads every page of groups with the OAuth header', async () => {
    const fetchMock = stubFetch((url) => {
      const page = url.searchParams.get('page');
      return json({
        groups: [{ id: page === '1' ? 1 : 2, name: `Group ${page}`, externalId: null, membersCount: 3 }],
        pages: 2,
      });
    });

    const result = await createConnector().listGroups();

    expect(result.ok && result.value.map((g) => g.id)).toEqual([1, 2]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [firstUrl, firstInit] = fetchMock.mock.calls[0] ?? [];
    expect(String(firstUrl)).toBe('https://directory.test/directory/v1/org/42/groups?page=1&perPage=1000');
    expect(firstInit?.headers).toMatchObject({ Authorization: 'OAuth test-secret' });
  });

  it('maps groups without optional fields to undefined', async () => {
    stubFetch(() => json({ groups: [{ id: 9, name: 'Ops', label: null }], pages: 1 }));

    const result = await createConnector().listGroups();

    expect(result).toEqual({
      ok: true,
      value: [
        {
          id: 9,
          externalId: undefined,
          name: 'Ops',
          label: undefined,
          description: undefined,
          membersCount: 0,
        },
      ],
    });
  });

  it('drops robots and service accounts from the user listing', async () => {
    stubFetch(() =>
      json({
        users: [
          { id: '1130000000000001', nickname: 'alice', aliases: ['a.smith'] },
          { id: '1130000000000002', nickname: 'mailer', isRobot: true },
          { id: '1000', nickname: 'svc' },
        ],
        pages: 1,
      })
    );

    const result = await createConnector({ minUserId: 1130000000000000 }).listUsers();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((u) => u.primaryHandle)).toEqual(['alice']);
    expect(result.value[0]?.aliasHandles).toEqual(['a.smith']);
  });

  it('retries server errors with the linear schedule', async () => {
    const sleeps: number[] = [];
    let calls = 0;
    const fetchMock = stubFetch(() => {
      calls += 1;
      return calls === 1 ? json({ message: 'unavailable' }, 503) : json({ id: 7, removed: true });
    });

    const result = await createConnector({ sleeps }).deleteGroup(7);

    expect(result).toEqual({ ok: true, value: { removed: true } });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleeps).toEqual([2000]);
  });

  it('keeps the linear schedule when the config sets only attempts', async () => {
    const sleeps: number[] = [];
    const fetchMock = stubFetch(() => json({ message: 'unavailable' }, 503));
    const connector = new OrgDirectoryConnector({
      orgId: '42',
      token: 'test-secret',
      baseUrl: 'https://directory.test',
      retry: { attempts: 3 },
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    const result = await connector.deleteGroup(7);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([2000, 4000]);
    expect(!result.ok && result.error.code).toBe('SERVER_ERROR');
  });

  it('does not retry authentication failures', async () => {
    const fetchMock = stubFetch(() => json({ message: 'invalid token' }, 401));

    const result = await createConnector().listUsers();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('AUTHENTICATION_FAILED');
    expect(result.error.message).toBe('Directory API GET /users?page=1&perPage=1000 failed: HTTP 401 invalid token');
  });

  it('fails a paginated read as a whole when a later page fails', async () => {
    stubFetch((url) =>
      url.searchParams.get('page') === '1'
        ? json({ groups: [{ id: 1, name: 'A' }], pages: 2 })
        : json({ message: 'gone' }, 404)
    );

    const result = await createConnector().listGroups();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('NOT_FOUND');
  });

  it('reports payloads that do not match the schema', async () => {
    stubFetch(() => json({ groups: 'nope' }));

    const result = await createConnector().listGroups();

    expect(!result.ok && result.error.code).toBe('SCHEMA_MISMATCH');
  });

  it('maps a member removal response to removed', async () => {
    const fetchMock = stubFetch(() => json({ deleted: false }));

    const result = await createConnector().removeMember(7, 'user', '55');

    expect(result).toEqual({ ok: true, value: { removed: false } });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe('https://directory.test/directory/v1/org/42/groups/7/members/user/55');
    expect(init?.method).toBe('DELETE');
  });

  it('posts the member type and id when adding a member', async () => {
    const fetchMock = stubFetch(() => json({ id: '55', type: 'user', added: true }));

    const result = await createConnector().addMember(7, 'user', '55');

    expect(result).toEqual({ ok: true, value: { added: true } });
    const [, init] = fetchMock.mock.calls[0] ?? [];
    expect(init?.body).toBe(JSON.stringify({ type: 'user', id: '55' }));
  });

  it('returns only user members of a group', async () => {
    stubFetch(() =>
      json({
        users: [{ id: '55', nickname: 'bob', email: 'bob@corp.example' }],
        groups: [{ id: 3, name: 'nested' }],
        departments: [],
      })
    );

    const result = await createConnector().listGroupMembers(7);

    expect(result.ok && result.value.map((u) => [u.id, u.primaryHandle, u.email])).toEqual([
      ['55', 'bob', 'bob@corp.example'],
    ]);
  });

  it('turns an aborted request into a timeout', async () => {
    stubFetch(() => {
      const aborted = new Error('The operation was aborted');
      aborted.name = 'AbortError';
      throw aborted;
    });
    const connector = new OrgDirectoryConnector({
      orgId: '42',
      token: 'test-secret',
      baseUrl: 'https://directory.test',
      retry: { attempts: 1 },
    });

    const result = await connector.patchGroup(7, { name: 'Renamed' });

    expect(!result.ok && result.error.code).toBe('TIMEOUT');
  });

  it('times out a response whose body never finishes', async () => {
    class StalledResponse extends Response {
      constructor(private readonly signal: AbortSignal | undefined) {
        super(null, { status: 200 });
      }

      override text(): Promise<string> {
        return new Promise((_resolve, reject) => {
          this.signal?.addEventListener('abort', () => reject(new Error('body stream closed')));
        });
      }
    }
    stubFetch((_url, init) => new StalledResponse(init?.signal ?? undefined));
    const connector = new OrgDirectoryConnector({
      orgId: '42',
      token: 'test-secret',
      baseUrl: 'https://directory.test',
      timeoutMs: 20,
      retry: { attempts: 1 },
    });

    const result = await connector.listGroups();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('TIMEOUT');
    expect(result.error.message).toBe('Directory API GET /groups?page=1&perPage=1000 timed out after 20ms');
  });

  it('reports an invalid token from the connection test', async () => {
    stubFetch(() => json({ message: 'invalid token' }, 401));

    await expect(createConnector().testConnection()).resolves.toBe(false);
  });
});
