import type { DriveApi } from '../drive/types';
import { ConfigError, errorMessage, isFatal } from '../errors';
import type { Logger } from '../logger';
import type { StrmWriter } from '../services/strmWriter';
import { emptyCounts } from '../types';
import type { RemoteId, ShareCoordinates, ShareFileRef, SyncCounts, SyncReport } from '../types';
import { buildShareUrl } from '../utils/mediaUtils';
import { hasPrefix, joinRemote, mirrorPath } from '../utils/pathMapper';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep';

export interface ShareSyncOptions {
  drive: DriveApi;
  writer: StrmWriter;
  serverAddress: string;
  apiKey: string;
  logger: Logger;
  /** Pause after every this many files. */
  throttleEvery?: number;
  throttleMs?: number;
  sleep?: Sleep;
}

export interface ShareSyncJob {
  share: ShareCoordinates;
  /** Share-internal directory to start from; `0` is the share root. */
  startId?: RemoteId;
  /** Only files under this share path are mirrored. */
  panPath: string;
  localPath: string;
}

const TAG = '[ShareSync]';

export class ShareSyncEngine {
  private readonly options: ShareSyncOptions;
  private readonly throttleEvery: number;
  private readonly throttleMs: number;
  private readonly sleep: Sleep;
  private processed = 0;

  constructor(options: ShareSyncOptions) {
    this.options = options;
    this.throttleEvery = options.throttleEvery ?? 100;
    this.throttleMs = options.throttleMs ?? 2000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(job: ShareSyncJob): Promise<SyncReport> {
    if (!job.share.shareCode) throw new ConfigError('Share sync needs a share code');
    if (!job.panPath || !job.localPath) throw new ConfigError('Share sync needs both a share path and a local path');

    const counts = emptyCounts();
    const errors: string[] = [];
    this.processed = 0;

    const stack: Array<{ id: RemoteId; path: string }> = [{ id: job.startId ?? '0', path: '/' }];
    while (stack.length > 0) {
      const dir = stack.pop();
      if (!dir) break;
      try {
        for await (const item of this.options.drive.listShareDirectory(job.share, dir.id, dir.path)) {
          const itemPath = joinRemote(dir.path, item.name);
          if (item.isDirectory) {
            stack.push({ id: item.fileId, path: itemPath });
            continue;
          }
          await this.syncFile(job, item, itemPath, counts);
          await this.throttle();
        }
      } catch (err) {
        if (isFatal(err)) throw err;
        const msg = `Listing ${dir.path} in share ${job.share.shareCode} failed: ${errorMessage(err)}`;
        this.options.logger.error(`${TAG} ${msg}`);
        errors.push(msg);
      }
    }

    this.options.logger.info(
      `${TAG} Done: generated ${counts.generated}, skipped ${counts.skipped}, failed ${counts.failed}`,
    );
    return { counts, errors };
  }

  private async throttle(): Promise<void> {
    this.processed++;
    if (this.throttleEvery > 0 && this.processed % this.throttleEvery === 0) {
      this.options.logger.info(`${TAG} Pausing ${this.throttleMs}ms after ${this.processed} files`);
      await this.sleep(this.throttleMs);
    }
  }

  private async syncFile(job: ShareSyncJob, item: ShareFileRef, itemPath: string, counts: SyncCounts): Promise<void> {
    const { writer, logger, serverAddress, apiKey } = this.options;

    if (!hasPrefix(itemPath, job.panPath)) {
      logger.debug(`${TAG} Outside ${job.panPath}, skipping: ${itemPath}`);
      counts.skipped++;
      return;
    }
    if (!writer.accepts(item.name)) {
      logger.debug(`${TAG} Skipping non-media file: ${itemPath}`);
      counts.skipped++;
      return;
    }

    const missing = !item.fileId ? 'id' : !item.shareCode ? 'share_code' : !item.receiveCode ? 'receive_code' : null;
    if (missing) {
      logger.error(`${TAG} ${item.name} has no ${missing}, cannot write pointer`);
      counts.failed++;
      return;
    }

    const mediaPath = mirrorPath(itemPath, job.panPath, job.localPath);
    try {
      const url = buildShareUrl(serverAddress, apiKey, item.shareCode, item.receiveCode, item.fileId);
      const result = await writer.write(mediaPath, url);
      if (result.status === 'written') counts.generated++;
      else counts.skipped++;
    } catch (err) {
      if (isFatal(err)) throw err;
      logger.error(`${TAG} Failed to write pointer for ${mediaPath}: ${errorMessage(err)}`);
      counts.failed++;
    }
  }
}
