import path from 'path';
import type { DriveApi } from '../drive/types';
import { errorMessage, isFatal } from '../errors';
import type { Logger } from '../logger';
import { removeOrphans } from '../scanner';
import { StrmWriter, strmPathFor } from '../services/strmWriter';
import { emptyCounts } from '../types';
import type { PathMappingRule, RemoteId, SyncCounts, SyncReport } from '../types';
import { buildPickcodeUrl, isValidPickcode } from '../utils/mediaUtils';
import { joinRemote, mirrorPath } from '../utils/pathMapper';

export interface FullSyncOptions {
  drive: DriveApi;
  writer: StrmWriter;
  serverAddress: string;
  apiKey: string;
  removeOrphans: boolean;
  logger: Logger;
}

const TAG = '[FullSync]';

/**
 * Walks each configured remote root and writes one pointer file per media
 * file under the mirrored local root. Pairs are isolated: a pair that fails
 * is logged and the next one still runs. Only ConfigError and AuthError
 * escape `run`.
 */
export class FullSyncEngine {
  private readonly options: FullSyncOptions;

  constructor(options: FullSyncOptions) {
    this.options = options;
  }

  async run(pairs: readonly PathMappingRule[]): Promise<SyncReport> {
    const counts = emptyCounts();
    const errors: string[] = [];
    for (const rule of pairs) {
      const error = await this.syncPair(rule, counts);
      if (error) errors.push(error);
    }
    this.options.logger.info(
      `${TAG} Done: generated ${counts.generated}, skipped ${counts.skipped}, failed ${counts.failed}, removed ${counts.removed}`,
    );
    return { counts, errors };
  }

  /** Returns an error summary when the pair could not be walked completely. */
  private async syncPair(rule: PathMappingRule, counts: SyncCounts): Promise<string | null> {
    const { drive, logger } = this.options;
    const remoteRoot = joinRemote('/', rule.remoteRoot.split('/').filter(Boolean).join('/'));

    let rootId: RemoteId;
    try {
      rootId = await drive.getIdByPath(remoteRoot);
      logger.info(`${TAG} ${remoteRoot} -> ${rule.localRoot} (id ${rootId})`);
    } catch (err) {
      if (isFatal(err)) throw err;
      const msg = `Cannot resolve ${remoteRoot}: ${errorMessage(err)}`;
      logger.error(`${TAG} ${msg}`);
      return msg;
    }

    const keep = new Set<string>();
    const failedBefore = counts.failed;
    const stack: Array<{ id: RemoteId; path: string }> = [{ id: rootId, path: remoteRoot }];

    try {
      while (stack.length > 0) {
        const dir = stack.pop();
        if (!dir) break;
        for await (const item of drive.listDirectory(dir.id, dir.path)) {
          const itemPath = joinRemote(dir.path, item.name);
          if (item.isDirectory) {
            stack.push({ id: item.remoteId, path: itemPath });
            continue;
          }
          const mediaPath = mirrorPath(itemPath, remoteRoot, rule.localRoot);
          await this.syncFile(mediaPath, item.pickcode, counts, keep);
        }
      }
    } catch (err) {
      if (isFatal(err)) throw err;
      const msg = `Walk of ${remoteRoot} failed: ${errorMessage(err)}`;
      logger.error(`${TAG} ${msg}`);
      return msg;
    }

    if (this.options.removeOrphans) {
      if (counts.failed > failedBefore) {
        logger.warn(`${TAG} ${remoteRoot} had failures, orphan sweep skipped for ${rule.localRoot}`);
      } else {
        counts.removed += await removeOrphans(rule.localRoot, keep, logger);
      }
    }
    return null;
  }

  private async syncFile(
    mediaPath: string,
    pickcode: string | undefined,
    counts: SyncCounts,
    keep: Set<string>,
  ): Promise<void> {
    const { writer, logger, serverAddress, apiKey } = this.options;
    const name = path.basename(mediaPath);

    if (!writer.accepts(name)) {
      logger.debug(`${TAG} Skipping non-media file: ${mediaPath}`);
      counts.skipped++;
      return;
    }
    // Keep the pointer even if this write fails, so the sweep never removes a file that still exists remotely.
    keep.add(path.resolve(strmPathFor(mediaPath)));

    if (!pickcode) {
      logger.error(`${TAG} ${name} has no pickcode, cannot write pointer`);
      counts.failed++;
      return;
    }
    if (!isValidPickcode(pickcode)) {
      logger.error(`${TAG} Bad pickcode ${pickcode} for ${name}, cannot write pointer`);
      counts.failed++;
      return;
    }

    try {
      const result = await writer.write(mediaPath, buildPickcodeUrl(serverAddress, apiKey, pickcode), pickcode);
      if (result.status === 'written') counts.generated++;
      else counts.skipped++;
    } catch (err) {
      if (isFatal(err)) throw err;
      logger.error(`${TAG} Failed to write pointer for ${mediaPath}: ${errorMessage(err)}`);
      counts.failed++;
    }
  }
}
