import path from 'path';
import type { DriveApi, LifePull } from '../drive/types';
import { errorMessage, isFatal, TransientLoopError } from '../errors';
import type { Logger } from '../logger';
import { refreshLibrary, type MediaServerRefresher } from '../services/mediaServer';
import type { StrmWriter } from '../services/strmWriter';
import { TtlCache } from '../services/ttlCache';
import { emptyCounts, LIFE_EVENT_TYPES } from '../types';
import type { LifeCursor, LifeEvent, SyncCounts } from '../types';
import { buildPickcodeUrl, isValidPickcode } from '../utils/mediaUtils';
import { joinRemote, mirrorPath, PathMapper } from '../utils/pathMapper';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep';

const RELEVANT_TYPES: ReadonlySet<number> = new Set(Object.values(LIFE_EVENT_TYPES));

export type EventOutcome = 'written' | 'skipped' | 'failed' | 'ignored';

export interface LifeMonitorOptions {
  drive: DriveApi;
  writer: StrmWriter;
  mapper: PathMapper;
  /** Remote directory id -> absolute remote path. */
  idPathCache: TtlCache<string, string>;
  serverAddress: string;
  apiKey: string;
  logger: Logger;
  pollIntervalMs?: number;
  refresher?: MediaServerRefresher | null;
  initialCursor?: () => LifeCursor;
  sleep?: Sleep;
}

const TAG = '[LifeMonitor]';

/**
 * Follows the remote activity feed and writes pointer files for uploads,
 * moves and received files as they happen. `run` exits cleanly when its
 * signal aborts; any failure to pull the feed ends the run with a
 * TransientLoopError and restarting is left to the supervisor.
 */
export class LifeMonitor {
  private readonly options: LifeMonitorOptions;
  private readonly sleep: Sleep;
  readonly counts: SyncCounts = emptyCounts();

  constructor(options: LifeMonitorOptions) {
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Position after the last handled event; a restarted run resumes here. */
  private cursor: LifeCursor | null = null;

  get lastCursor(): LifeCursor | null {
    return this.cursor;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { drive, logger } = this.options;
    let cursor =
      this.cursor ?? this.options.initialCursor?.() ?? { fromTime: Math.floor(Date.now() / 1000), fromId: 0 };
    this.cursor = cursor;
    logger.info(`${TAG} Watching activity events from ${cursor.fromTime}/${cursor.fromId}`);

    while (!signal.aborted) {
      let pulled: LifePull;
      try {
        pulled = await drive.pullLifeEvents(cursor);
      } catch (err) {
        if (isFatal(err)) throw err;
        throw new TransientLoopError(err);
      }

      if (pulled.events.length === 0) {
        cursor = this.cursor = pulled.cursor;
        await this.sleep(this.options.pollIntervalMs ?? 10_000, signal);
        continue;
      }

      const written: string[] = [];
      let handled = 0;
      try {
        for (const event of pulled.events) {
          if (signal.aborted) break;
          const outcome = await this.handleEvent(event, written);
          if (outcome !== 'ignored') this.counts[outcome === 'written' ? 'generated' : outcome]++;
          handled++;
          this.cursor = { fromTime: event.updateTime, fromId: event.id };
        }
      } finally {
        await this.refresh(written);
      }
      if (handled === pulled.events.length) this.cursor = pulled.cursor;
      cursor = this.cursor ?? pulled.cursor;
    }
    logger.info(`${TAG} Stop requested, exiting`);
  }

  async handleEvent(event: LifeEvent, written: string[] = []): Promise<EventOutcome> {
    const { drive, writer, mapper, idPathCache, logger, serverAddress, apiKey } = this.options;
    if (!RELEVANT_TYPES.has(event.type)) return 'ignored';

    try {
      const parentPath = await idPathCache.getOrCompute(event.parentId, () => drive.getDirectoryPath(event.parentId));
      const remotePath = joinRemote(parentPath, event.fileName);
      const match = mapper.resolve(remotePath);
      if (!match.matched) {
        logger.debug(`${TAG} No mapping for ${remotePath}`);
        return 'ignored';
      }

      const mediaPath = mirrorPath(remotePath, match.remoteRoot, match.localRoot);
      if (!writer.accepts(event.fileName)) {
        logger.debug(`${TAG} Skipping non-media file: ${remotePath}`);
        return 'skipped';
      }
      if (!event.pickcode) {
        logger.error(`${TAG} ${event.fileName} has no pickcode, cannot write pointer`);
        return 'failed';
      }
      if (!isValidPickcode(event.pickcode)) {
        logger.error(`${TAG} Bad pickcode ${event.pickcode} for ${event.fileName}, cannot write pointer`);
        return 'failed';
      }

      const result = await writer.write(mediaPath, buildPickcodeUrl(serverAddress, apiKey, event.pickcode), event.pickcode);
      if (result.status !== 'written') return 'skipped';
      written.push(result.path);
      return 'written';
    } catch (err) {
      if (isFatal(err)) throw err;
      logger.error(`${TAG} Event ${event.id} (${path.basename(event.fileName)}) failed: ${errorMessage(err)}`);
      return 'failed';
    }
  }

  private async refresh(paths: string[]): Promise<void> {
    const { refresher, logger } = this.options;
    if (!refresher || paths.length === 0) return;
    try {
      await refreshLibrary(refresher, paths);
      logger.info(`${TAG} Asked ${refresher.name} to refresh ${paths.length} item(s)`);
    } catch (err) {
      logger.warn(`${TAG} ${refresher.name} refresh failed: ${errorMessage(err)}`);
    }
  }
}
