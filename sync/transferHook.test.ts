import fs from 'fs/promises';
import path from 'path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { UpstreamError, ValidationError } from '../errors';
import type { MediaServerRefresher } from '../services/mediaServer';
import { StrmWriter } from '../services/strmWriter';
import { createTestLogger, listFiles, makeTempDir } from '../testing/helpers';
import { PathMapper } from '../utils/pathMapper';
import { TransferHook, type TransferHookOptions } from './transferHook';

const PICKCODE = 'ecjq9ichcb40lzlvx';

describe('TransferHook', () => {
  let local: string;
  let logger: ReturnType<typeof createTestLogger>;

  beforeEach(async () => {
    local = await makeTempDir();
    logger = createTestLogger();
  });

  const hook = (extra: Partial<TransferHookOptions> = {}) =>
    new TransferHook({
      writer: new StrmWriter({ mediaExts: ['.mkv', '.m2ts'], logger }),
      mapper: new PathMapper([{ localRoot: local, remoteRoot: '/Media/Movies' }]),
      serverAddress: 'http://mp:3000',
      apiKey: 'test-key',
      logger,
      ...extra,
    });

  it('writes the pointer under the mapped local root', async () => {
    const outcome = await hook().handle({ path: '/Media/Movies/Film (2020)/Film.mkv', pickcode: PICKCODE });

    const target = path.join(local, 'Film (2020)', 'Film.strm');
    expect(outcome).toEqual({ status: 'written', path: target });
    expect(await fs.readFile(target, 'utf-8')).toBe(
      `http://mp:3000/redirect_url?apikey=test-key&pickcode=${PICKCODE}`,
    );
  });

  it('refreshes the media server with the new pointer', async () => {
    const refreshByPaths = vi.fn(async (_paths: string[]) => {});
    const refresher: MediaServerRefresher = { kind: 'paths', name: 'Emby', refreshByPaths };

    await hook({ refresher }).handle({ path: '/Media/Movies/A.mkv', pickcode: PICKCODE });

    expect(refreshByPaths).toHaveBeenCalledWith([path.join(local, 'A.strm')]);
  });

  it('keeps the pointer when the refresh fails', async () => {
    const refresher: MediaServerRefresher = {
      kind: 'whole',
      name: 'Jellyfin',
      refreshWhole: async () => Promise.reject(new UpstreamError('Media server responded with 500')),
    };

    const outcome = await hook({ refresher }).handle({ path: '/Media/Movies/A.mkv', pickcode: PICKCODE });

    expect(outcome.status).toBe('written');
    expect(logger.warn).toHaveBeenCalledWith('[Transfer] Jellyfin refresh failed: Media server responded with 500');
  });

  it('skips files outside every mapped root', async () => {
    expect(await hook().handle({ path: '/Media/MoviesExtra/A.mkv', pickcode: PICKCODE })).toEqual({
      status: 'skipped',
      reason: 'unmapped',
    });
    expect(await listFiles(local)).toEqual([]);
  });

  it('skips Blu-ray disc structures', async () => {
    const outcome = await hook().handle({ path: '/Media/Movies/Film/BDMV/STREAM/00000.m2ts', pickcode: PICKCODE });

    expect(outcome).toEqual({ status: 'skipped', reason: 'bluray' });
    expect(await listFiles(local)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      '[Transfer] 00000.m2ts belongs to a Blu-ray disc structure, no pointer written: /Media/Movies/Film/BDMV/STREAM/00000.m2ts',
    );
  });

  it('skips files outside the extension allow-list', async () => {
    expect(await hook().handle({ path: '/Media/Movies/A.nfo', pickcode: PICKCODE })).toEqual({
      status: 'skipped',
      reason: 'extension',
    });
  });

  it('rejects an unusable pickcode or path', async () => {
    await expect(hook().handle({ path: '/Media/Movies/A.mkv', pickcode: '' })).rejects.toThrow('A.mkv has no pickcode');
    await expect(hook().handle({ path: '/Media/Movies/A.mkv', pickcode: 'short' })).rejects.toThrow(
      'Bad pickcode: short',
    );
    await expect(hook().handle({ path: 'Media/A.mkv', pickcode: PICKCODE })).rejects.toBeInstanceOf(ValidationError);
    expect(await listFiles(local)).toEqual([]);
  });
});
