import { Readable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { createMsClient, toBaseUrl } from '../src/client/create-client';
import { MsAuthError, MsHttpError } from '../src/http/errors';
import { FakeTransport, jsonBody } from './support/fake-transport';
import { MemorySessionStore } from './support/memory-session-store';

const HOST = 'ms.example.test';

function createClient(transport: FakeTransport, sessionStore = new MemorySessionStore(), username = 'test-user') {
  return createMsClient({ host: HOST, username, password: 'test-secret', transport, sessionStore });
}

describe('ms client sessions', () => {
  it('assumes https for bare hosts', () => {
    expect(toBaseUrl('ms.example.test')).toBe('https://ms.example.test');
    expect(toBaseUrl('http://localhost:3000')).toBe('http://localhost:3000');
  });

  it('logs in once and reuses the session id', async () => {
    const transport = new FakeTransport({ sessionId: 'session-abc' }).on('GET', '/nerve/nodes/list', { data: [] });
    const sessionStore = new MemorySessionStore();
    const client = createClient(transport, sessionStore);

    await client.nodes.list();
    await client.nodes.list();

    const logins = transport.calls('POST', '/auth/login');
    expect(logins).toHaveLength(1);
    expect(jsonBody(logins[0])).toEqual({ identity: 'test-user', secret: 'test-secret' });
    expect(logins[0].url).toBe('https://ms.example.test/auth/login');
    expect(transport.calls('GET', '/nerve/nodes/list').map((request) => request.headers?.sessionid)).toEqual([
      'session-abc',
      'session-abc'
    ]);
    expect((await sessionStore.get(HOST))?.sessionId).toBe('session-abc');
  });

  it('reuses a cached session without logging in', async () => {
    const transport = new FakeTransport().on('GET', '/nerve/nodes/list', { data: [] });
    const sessionStore = new MemorySessionStore();
    await sessionStore.set(HOST, { sessionId: 'cached', username: 'test-user', createdAt: '2024-01-01T00:00:00.000Z' });

    await createClient(transport, sessionStore).nodes.list();

    expect(transport.calls('POST', '/auth/login')).toHaveLength(0);
    expect(transport.calls('GET', '/nerve/nodes/list')[0].headers?.sessionid).toBe('cached');
  });

  it('ignores a cached session of another user', async () => {
    const transport = new FakeTransport({ sessionId: 'fresh' }).on('GET', '/nerve/nodes/list', { data: [] });
    const sessionStore = new MemorySessionStore();
    await sessionStore.set(HOST, { sessionId: 'cached', username: 'someone-else', createdAt: '2024-01-01T00:00:00.000Z' });

    await createClient(transport, sessionStore).nodes.list();

    expect(transport.calls('POST', '/auth/login')).toHaveLength(1);
    expect(transport.calls('GET', '/nerve/nodes/list')[0].headers?.sessionid).toBe('fresh');
  });

  it('logs in again once when the cached session is rejected', async () => {
    const transport = new FakeTransport({ sessionId: 'fresh' }).on('GET', '/nerve/nodes/list', (request) =>
      request.headers?.sessionid === 'stale' ? { status: 401, statusText: 'Unauthorized' } : { data: [{ serialNumber: 'SN-1', name: 'node-1' }] }
    );
    const sessionStore = new MemorySessionStore();
    await sessionStore.set(HOST, { sessionId: 'stale', username: 'test-user', createdAt: '2024-01-01T00:00:00.000Z' });

    const nodes = await createClient(transport, sessionStore).nodes.list();

    expect(nodes).toEqual([{ serialNumber: 'SN-1', name: 'node-1' }]);
    expect(transport.calls('POST', '/auth/login')).toHaveLength(1);
    expect(transport.calls('GET', '/nerve/nodes/list')).toHaveLength(2);
    expect((await sessionStore.get(HOST))?.sessionId).toBe('fresh');
  });

  it('does not retry a 401 on a fresh session', async () => {
    const transport = new FakeTransport().on('GET', '/nerve/nodes/list', { status: 401, statusText: 'Unauthorized' });

    await expect(createClient(transport).nodes.list()).rejects.toBeInstanceOf(MsHttpError);
    expect(transport.calls('POST', '/auth/login')).toHaveLength(1);
    expect(transport.calls('GET', '/nerve/nodes/list')).toHaveLength(1);
  });

  it('requires credentials to log in', async () => {
    const transport = new FakeTransport();
    const client = createMsClient({ host: HOST, transport, sessionStore: new MemorySessionStore() });

    await expect(client.nodes.list()).rejects.toThrow(new MsAuthError('No username/password provided for MS login'));
    expect(transport.requests).toHaveLength(0);
  });

  it('reports rejected credentials', async () => {
    const transport = new FakeTransport().on('POST', '/auth/login', {
      status: 403,
      statusText: 'Forbidden',
      data: [{ message: 'Wrong username or password' }]
    });

    await expect(createClient(transport).login()).rejects.toThrow(
      'Invalid credentials for ms.example.test: Wrong username or password'
    );
  });

  it('logs out and clears the cached session', async () => {
    const transport = new FakeTransport();
    const sessionStore = new MemorySessionStore();
    await sessionStore.set(HOST, { sessionId: 'cached', username: 'test-user', createdAt: '2024-01-01T00:00:00.000Z' });

    await createClient(transport, sessionStore).logout();

    expect(transport.calls('POST', '/auth/logout')[0].headers?.sessionid).toBe('cached');
    await expect(sessionStore.get(HOST)).resolves.toBeUndefined();
  });

  it('treats an expired session on logout as logged out', async () => {
    const transport = new FakeTransport().on('POST', '/auth/logout', { status: 401, statusText: 'Unauthorized' });
    const sessionStore = new MemorySessionStore();
    await sessionStore.set(HOST, { sessionId: 'expired', username: 'test-user', createdAt: '2024-01-01T00:00:00.000Z' });

    await expect(createClient(transport, sessionStore).logout()).resolves.toBeUndefined();
    await expect(sessionStore.get(HOST)).resolves.toBeUndefined();
  });

  it('skips the logout call without a session', async () => {
    const transport = new FakeTransport();
    await createClient(transport).logout();
    expect(transport.requests).toHaveLength(0);
  });
});

describe('ms client requests', () => {
  it('fills path parameters and pages through workloads', async () => {
    const firstPage = Array.from({ length: 50 }, (_, index) => ({ _id: `wl-${index}`, name: `w${index}`, type: 'docker' }));
    const transport = new FakeTransport().on('GET', '/nerve/v3/workloads', (_request, url) =>
      url.searchParams.get('page') === '1'
        ? { data: { data: firstPage, count: 51 } }
        : { data: { data: [{ _id: 'wl-50', name: 'w50', type: 'vm' }], count: 51 } }
    );

    const workloads = await createClient(transport).workloads.list();

    expect(workloads).toHaveLength(51);
    expect(workloads[50]._id).toBe('wl-50');
    expect(transport.calls('GET', '/nerve/v3/workloads').map((request) => new URL(request.url).search)).toEqual([
      '?limit=50&page=1',
      '?limit=50&page=2'
    ]);
  });

  it('names exports after the content disposition header', async () => {
    const transport = new FakeTransport().on('GET', '/nerve/v3/workloads/wl-1/versions/v-1/export', {
      data: Readable.from([Buffer.from('archive')]),
      headers: { 'content-disposition': 'attachment; filename="nginx.tar.gz"' }
    });

    const exported = await createClient(transport).workloads.exportVersion('wl-1', 'v-1');

    expect(exported.fileName).toBe('nginx.tar.gz');
    const chunks: Buffer[] = [];
    for await (const chunk of exported.content) {
      chunks.push(Buffer.from(chunk));
    }
    expect(Buffer.concat(chunks).toString()).toBe('archive');
  });

  it('provisions through the versioned multipart endpoint', async () => {
    const transport = new FakeTransport().on('POST', '/nerve/v3/workloads', { data: { _id: 'wl-new' } });

    await createClient(transport).workloads.provision({
      definition: { name: 'compose', type: 'docker-compose' },
      files: [{ name: 'compose.yml', content: Buffer.from('services: {}') }],
      apiVersion: 3
    });

    const body = transport.calls('POST', '/nerve/v3/workloads')[0].body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get('data')).toBe('{"name":"compose","type":"docker-compose"}');
      expect(body.getAll('files')).toHaveLength(1);
    }
  });

  it('surfaces invalid payloads as validation errors', async () => {
    const transport = new FakeTransport().on('GET', '/nerve/nodes/list', { data: [{ name: 'no-serial' }] });

    await expect(createClient(transport).nodes.list()).rejects.toThrow(
      'Unexpected response from nodes.list: Invalid input'
    );
  });
});
