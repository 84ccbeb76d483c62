import type { AppConfig } from '../config';
import { UpstreamError } from '../errors';

/** How a media server can be told about new pointer files; picked once at wiring. */
export type MediaServerRefresher =
  | { kind: 'paths'; name: string; refreshByPaths(paths: string[]): Promise<void> }
  | { kind: 'whole'; name: string; refreshWhole(): Promise<void> };

const post = async (fetchImpl: typeof fetch, url: string, body?: unknown): Promise<void> => {
  const res = await fetchImpl(url, {
    method: 'POST',
    headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  if (!res.ok) throw new UpstreamError(`Media server responded with ${res.status}`);
};

export function createRefresher(
  settings: AppConfig['mediaServer'],
  fetchImpl: typeof fetch = fetch,
): MediaServerRefresher | null {
  if (!settings) return null;
  const { url } = settings;
  const key = encodeURIComponent(settings.apiKey);

  switch (settings.type) {
    case 'emby':
      return {
        kind: 'paths',
        name: 'Emby',
        refreshByPaths: (paths) =>
          post(fetchImpl, `${url}/emby/Library/Media/Updated?api_key=${key}`, {
            Updates: paths.map((p) => ({ Path: p, UpdateType: 'Created' })),
          }),
      };
    case 'jellyfin':
      return {
        kind: 'whole',
        name: 'Jellyfin',
        refreshWhole: () => post(fetchImpl, `${url}/Library/Refresh?api_key=${key}`),
      };
  }
}

export async function refreshLibrary(refresher: MediaServerRefresher, paths: string[]): Promise<void> {
  if (refresher.kind === 'paths') await refresher.refreshByPaths(paths);
  else await refresher.refreshWhole();
}
