import fs from 'fs/promises';
import path from 'path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../errors';
import { StrmWriter } from '../services/strmWriter';
import { FakeDrive } from '../testing/fakeDrive';
import { createTestLogger, listFiles, makeTempDir } from '../testing/helpers';
import { ShareSyncEngine } from './shareSync';

const share = { shareCode: 'sw68md23w8m', receiveCode: 'q353' };

// Ids follow insertion order: Show=d1, S01=d2, E01=f3, E02=f4, notes=f5, Other=d6, X=f7.
const shareTree = () =>
  new FakeDrive([
    { path: '/Show/S01/E01.mkv' },
    { path: '/Show/S01/E02.mkv' },
    { path: '/Show/notes.txt' },
    { path: '/Other/X.mkv' },
  ]);

describe('ShareSyncEngine', () => {
  let local: string;
  let logger: ReturnType<typeof createTestLogger>;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(async () => {
    local = await makeTempDir();
    logger = createTestLogger();
    sleep.mockClear();
  });

  const engine = (drive: FakeDrive, throttleEvery = 100) =>
    new ShareSyncEngine({
      drive,
      writer: new StrmWriter({ mediaExts: ['.mkv'], logger }),
      serverAddress: 'http://mp:3000',
      apiKey: 'test-key',
      logger,
      throttleEvery,
      sleep,
    });

  it('mirrors media files under the share path', async () => {
    const report = await engine(shareTree()).run({ share, panPath: '/Show', localPath: local });

    expect(await listFiles(local)).toEqual(['S01/E01.strm', 'S01/E02.strm']);
    expect(await fs.readFile(path.join(local, 'S01', 'E01.strm'), 'utf-8')).toBe(
      'http://mp:3000/redirect_url?apikey=test-key&share_code=sw68md23w8m&receive_code=q353&id=f3',
    );
    expect(report).toEqual({ counts: { generated: 2, skipped: 2, failed: 0, removed: 0 }, errors: [] });
  });

  it('pauses after every batch of files', async () => {
    await engine(shareTree(), 2).run({ share, panPath: '/Show', localPath: local });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('fails items that lack a receive code', async () => {
    const report = await engine(shareTree()).run({
      share: { shareCode: 'sw68md23w8m', receiveCode: '' },
      panPath: '/Show',
      localPath: local,
    });
    expect(report.counts.failed).toBe(2);
    expect(await listFiles(local)).toEqual([]);
  });

  it('records a listing failure and continues with other directories', async () => {
    const drive = shareTree();
    drive.listErrors.set('/Other', new Error('busy'));

    const report = await engine(drive).run({ share, panPath: '/', localPath: local });

    expect(report.errors).toEqual(['Listing /Other in share sw68md23w8m failed: busy']);
    expect(await listFiles(local)).toEqual(['Show/S01/E01.strm', 'Show/S01/E02.strm']);
  });

  it('needs a share code and both paths', async () => {
    const sync = engine(shareTree());
    await expect(sync.run({ share: { shareCode: '', receiveCode: '' }, panPath: '/', localPath: local })).rejects.toThrow(
      ConfigError,
    );
    await expect(sync.run({ share, panPath: '', localPath: local })).rejects.toThrow(ConfigError);
  });
});
