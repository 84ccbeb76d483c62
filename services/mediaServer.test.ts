import { describe, expect, it, vi } from 'vitest';
import { createRefresher, refreshLibrary } from './mediaServer';

const okFetch = () =>
  vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(null, { status: 204 }));

describe('media server refresh', () => {
  it('is disabled without settings', () => {
    expect(createRefresher(null)).toBeNull();
  });

  it('tells Emby about each new path', async () => {
    const fetchImpl = okFetch();
    const refresher = createRefresher({ type: 'emby', url: 'http://emby:8096', apiKey: 'test-key' }, fetchImpl);
    expect(refresher?.kind).toBe('paths');
    if (!refresher) return;

    await refreshLibrary(refresher, ['/local/movies/A.strm']);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://emby:8096/emby/Library/Media/Updated?api_key=test-key');
    expect(JSON.parse(String(init?.body))).toEqual({
      Updates: [{ Path: '/local/movies/A.strm', UpdateType: 'Created' }],
    });
  });

  it('asks Jellyfin for a whole library refresh', async () => {
    const fetchImpl = okFetch();
    const refresher = createRefresher({ type: 'jellyfin', url: 'http://jf:8096', apiKey: 'test-key' }, fetchImpl);
    if (!refresher) throw new Error('expected a refresher');

    await refreshLibrary(refresher, ['/local/movies/A.strm']);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://jf:8096/Library/Refresh?api_key=test-key');
    expect(init?.body).toBeUndefined();
  });

  it('reports a failed refresh', async () => {
    const fetchImpl = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) => new Response('', { status: 401 }),
    );
    const refresher = createRefresher({ type: 'jellyfin', url: 'http://jf:8096', apiKey: 'test-key' }, fetchImpl);
    if (!refresher) throw new Error('expected a refresher');
    await expect(refreshLibrary(refresher, [])).rejects.toThrow('Media server responded with 401');
  });
});
