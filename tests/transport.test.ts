import { Readable } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { HttpTransport } from '../src/http/transport';
import { MsHttpError } from '../src/http/errors';
import { captureLogger } from './support/context';

async function collect(data: unknown): Promise<Buffer> {
  if (!(data instanceof Readable)) {
    throw new Error('expected a stream');
  }
  const chunks: Buffer[] = [];
  for await (const chunk of data) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

describe('http transport', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('retries idempotent requests after transient failures', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new TypeError('network down'))
      .mockResolvedValueOnce(
        new Response(JSON.stringify({ ok: true }), {
          status: 200,
          headers: { 'content-type': 'application/json' }
        })
      );

    vi.stubGlobal('fetch', fetchMock);

    const transport = new HttpTransport({ retryAttempts: 1, retryBackoffMs: 1, logger: captureLogger().logger });
    const response = await transport.request({
      method: 'GET',
      url: 'https://ms.example.test/nerve/nodes/list'
    });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(response.data).toEqual({ ok: true });
    expect(response.meta.attempts).toBe(2);
    expect(response.meta.retryCount).toBe(1);
    expect(response.meta.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('does not retry non-idempotent requests', async () => {
    const fetchMock = vi.fn().mockRejectedValue(new TypeError('network down'));
    vi.stubGlobal('fetch', fetchMock);

    const transport = new HttpTransport({ retryAttempts: 2, retryBackoffMs: 1, logger: captureLogger().logger });

    await expect(
      transport.request({
        method: 'POST',
        url: 'https://ms.example.test/auth/login'
      })
    ).rejects.toThrow('network down');

    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('parses structured error responses', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify([{ message: 'Session expired' }]), {
        status: 401,
        statusText: 'Unauthorized',
        headers: { 'content-type': 'application/json' }
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const transport = new HttpTransport({ retryAttempts: 0, logger: captureLogger().logger });

    await expect(
      transport.request({ method: 'GET', url: 'https://ms.example.test/nerve/nodes/list', endpointKey: 'nodes.list' })
    ).rejects.toMatchObject({
      status: 401,
      endpointKey: 'nodes.list',
      details: [{ message: 'Session expired' }]
    } satisfies Partial<MsHttpError>);
  });

  it('wraps plain text bodies as a message', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response('Node is offline', { status: 409, statusText: 'Conflict' }))
    );

    const transport = new HttpTransport({ retryAttempts: 0, logger: captureLogger().logger });

    await expect(
      transport.request({ method: 'POST', url: 'https://ms.example.test/nerve/node/SN-1/reboot' })
    ).rejects.toMatchObject({ status: 409, details: { message: 'Node is offline' } });
  });

  it('hands downloads back as a stream', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        new Response(new Uint8Array([1, 2, 3]), {
          status: 200,
          headers: { 'content-type': 'application/json', 'Content-Disposition': 'attachment; filename="w.tar"' }
        })
      )
    );

    const transport = new HttpTransport({ logger: captureLogger().logger });
    const response = await transport.request({
      method: 'GET',
      url: 'https://ms.example.test/nerve/v3/workloads/wl-1/versions/v-1/export',
      responseType: 'stream'
    });

    expect(response.data).toBeInstanceOf(Readable);
    expect(await collect(response.data)).toEqual(Buffer.from([1, 2, 3]));
    expect(response.headers['content-disposition']).toBe('attachment; filename="w.tar"');
  });

  it('does not time out a download that outlasts the request timeout', async () => {
    let signal: AbortSignal | null | undefined;
    const body = new ReadableStream<Uint8Array>({
      async start(controller) {
        controller.enqueue(new Uint8Array([1]));
        await delay(80);
        controller.enqueue(new Uint8Array([2, 3]));
        controller.close();
      }
    });
    const fetchMock = vi.fn(async (_url: string, init?: { signal?: AbortSignal | null }) => {
      signal = init?.signal;
      return new Response(body, { status: 200 });
    });
    vi.stubGlobal('fetch', fetchMock);

    const transport = new HttpTransport({ timeoutMs: 20, logger: captureLogger().logger });
    const response = await transport.request({
      method: 'GET',
      url: 'https://ms.example.test/nerve/v3/workloads/wl-1/versions/v-1/export',
      responseType: 'stream'
    });

    expect(await collect(response.data)).toEqual(Buffer.from([1, 2, 3]));
    expect(signal?.aborted).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('logs completed requests at debug level', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(null, { status: 204 })));
    const { logger, lines } = captureLogger();

    await new HttpTransport({ logger }).request({ method: 'DELETE', url: 'https://ms.example.test/nerve/labels/l-1' });

    expect(lines()).toHaveLength(1);
    expect(lines()[0]).toMatch(/^HTTP DELETE https:\/\/ms\.example\.test\/nerve\/labels\/l-1 -> 204 \(\d+ms\)$/);
  });
});
