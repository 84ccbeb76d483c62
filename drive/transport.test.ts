import { describe, expect, it, vi } from 'vitest';
import { AuthError, UpstreamError } from '../errors';
import { FetchTransport } from './transport';

const respond = (body: string, status = 200) =>
  vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body, { status }));

describe('FetchTransport', () => {
  it('sends the cookie and encodes the query', async () => {
    const fetchImpl = respond(JSON.stringify({ state: true }));
    const transport = new FetchTransport({ cookie: 'UID=test', fetch: fetchImpl });

    expect(await transport.getJson('https://api.test/files', { cid: 5, path: '/a b' })).toEqual({ state: true });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://api.test/files?cid=5&path=%2Fa+b');
    expect(init?.headers).toMatchObject({ Cookie: 'UID=test' });
    expect(init?.method).toBe('GET');
  });

  it('posts a url-encoded form', async () => {
    const fetchImpl = respond(JSON.stringify({ state: true }));
    const transport = new FetchTransport({ cookie: 'UID=test', fetch: fetchImpl });

    await transport.postForm('https://api.test/dl', { data: '{"a":1}' }, { 'User-Agent': 'UA' });

    const [, init] = fetchImpl.mock.calls[0];
    expect(init?.body).toBe('data=%7B%22a%22%3A1%7D');
    expect(init?.headers).toMatchObject({
      'User-Agent': 'UA',
      'Content-Type': 'application/x-www-form-urlencoded',
    });
  });

  it('maps rejected credentials to AuthError', async () => {
    const transport = new FetchTransport({ cookie: 'UID=test', fetch: respond('nope', 401) });
    await expect(transport.getJson('https://api.test/x')).rejects.toBeInstanceOf(AuthError);
  });

  it('maps a logged-out envelope to AuthError', async () => {
    const transport = new FetchTransport({
      cookie: 'UID=test',
      fetch: respond(JSON.stringify({ state: false, errno: 990001 })),
    });
    await expect(transport.getJson('https://api.test/x')).rejects.toBeInstanceOf(AuthError);
  });

  it('passes other failure envelopes through for the caller to judge', async () => {
    const transport = new FetchTransport({
      cookie: 'UID=test',
      fetch: respond(JSON.stringify({ state: false, errno: 20021 })),
    });
    expect(await transport.getJson('https://api.test/x')).toEqual({ state: false, errno: 20021 });
  });

  it('reports server errors and non-JSON bodies as UpstreamError', async () => {
    const failing = new FetchTransport({ cookie: 'UID=test', fetch: respond('down', 502) });
    await expect(failing.getJson('https://api.test/x')).rejects.toThrow('HTTP Error 502: down');

    const html = new FetchTransport({ cookie: 'UID=test', fetch: respond('<html>') });
    await expect(html.getJson('https://api.test/x')).rejects.toBeInstanceOf(UpstreamError);
  });

  it('wraps network failures', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new Error('ECONNRESET');
    });
    const transport = new FetchTransport({ cookie: 'UID=test', fetch: fetchImpl });
    await expect(transport.getJson('https://api.test/x')).rejects.toThrow('GET https://api.test/x failed: ECONNRESET');
  });
});
