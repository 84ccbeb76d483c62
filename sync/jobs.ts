import { requireSyncSettings, type AppConfig } from '../config';
import type { DriveApi } from '../drive/types';
import { ConfigError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { SyncHistory } from '../services/history';
import type { Notifier } from '../services/notifier';
import { StrmWriter } from '../services/strmWriter';
import { emptyCounts } from '../types';
import type { SyncKind, SyncReport, SyncStatus } from '../types';
import { FullSyncEngine } from './fullSync';
import { ShareSyncEngine } from './shareSync';
import type { Sleep } from '../utils/sleep';

export type JobKind = Extract<SyncKind, 'full' | 'share'>;

export interface SyncJobsOptions {
  config: AppConfig;
  drive: DriveApi;
  logger: Logger;
  history?: SyncHistory | null;
  notifier?: Notifier | null;
  sleep?: Sleep;
}

const idle = (): SyncStatus => ({ isRunning: false, step: 'Idle', counts: emptyCounts(), error: null });

/**
 * One-shot Full and Share Sync runs. At most one run per kind at a time; a
 * second request while one is running is refused, not queued.
 */
export class SyncJobs {
  private readonly options: SyncJobsOptions;
  private readonly statuses: Record<JobKind, SyncStatus> = { full: idle(), share: idle() };

  constructor(options: SyncJobsOptions) {
    this.options = options;
  }

  status(kind: JobKind): SyncStatus {
    const s = this.statuses[kind];
    return { ...s, counts: { ...s.counts } };
  }

  isRunning(kind: JobKind): boolean {
    return this.statuses[kind].isRunning;
  }

  /** Resolves to null when a full sync is already running or the run aborted. */
  runFull(): Promise<SyncReport | null> {
    return this.run('full', () => {
      const { config } = this.options;
      requireSyncSettings(config, { paths: true });
      const engine = new FullSyncEngine({
        drive: this.options.drive,
        writer: this.writer('[FullSync]'),
        serverAddress: config.serverAddress,
        apiKey: config.apiKey,
        removeOrphans: config.fullSync.removeOrphans,
        logger: this.options.logger,
      });
      return engine.run(config.fullSync.pairs);
    });
  }

  /** Resolves to null when a share sync is already running or the run aborted. */
  runShare(): Promise<SyncReport | null> {
    return this.run('share', () => {
      const { config } = this.options;
      requireSyncSettings(config);
      const { share } = config;
      if (!share.coordinates) throw new ConfigError('SHARE_LINK or SHARE_CODE is required for share sync');
      const engine = new ShareSyncEngine({
        drive: this.options.drive,
        writer: this.writer('[ShareSync]'),
        serverAddress: config.serverAddress,
        apiKey: config.apiKey,
        logger: this.options.logger,
        throttleEvery: share.throttleEvery,
        throttleMs: share.throttleMs,
        sleep: this.options.sleep,
      });
      return engine.run({ share: share.coordinates, panPath: share.panPath, localPath: share.localPath });
    });
  }

  private writer(tag: string): StrmWriter {
    const { config, logger } = this.options;
    return new StrmWriter({ mediaExts: config.mediaExts, overwriteMode: config.overwriteMode, logger, tag });
  }

  private async run(kind: JobKind, work: () => Promise<SyncReport>): Promise<SyncReport | null> {
    const { logger, history, notifier } = this.options;
    if (this.statuses[kind].isRunning) {
      logger.warn(`[Jobs] ${kind} sync already running, request ignored`);
      return null;
    }

    const status: SyncStatus = { isRunning: true, step: 'Syncing', counts: emptyCounts(), error: null };
    this.statuses[kind] = status;
    const startedAt = Date.now();
    let report: SyncReport | null = null;

    try {
      report = await work();
      status.counts = report.counts;
      status.step = 'Complete';
    } catch (e) {
      status.error = errorMessage(e);
      status.step = 'Error';
      logger.error(`[Jobs] ${kind} sync aborted: ${status.error}`);
    } finally {
      status.isRunning = false;
    }

    const finishedAt = Date.now();
    const counts = report?.counts ?? emptyCounts();
    const errors = report?.errors ?? (status.error ? [status.error] : []);
    try {
      await history?.record({ kind, startedAt, finishedAt, ...counts, error: status.error ?? (errors.join('; ') || null) });
    } catch (e) {
      logger.warn(`[Jobs] Could not record ${kind} run: ${errorMessage(e)}`);
    }
    try {
      await notifier?.notify({ kind, counts, errors, durationMs: finishedAt - startedAt });
    } catch (e) {
      logger.warn(`[Jobs] Notification failed: ${errorMessage(e)}`);
    }
    return report;
  }
}
