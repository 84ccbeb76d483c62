import type { AppConfig } from './config';
import { passthroughCipher } from './drive/cipher';
import { UrlResolver } from './drive/resolver';
import { FetchTransport } from './drive/transport';
import type { DriveApi, PayloadCipher } from './drive/types';
import { WebDriveApi } from './drive/webApi';
import type { Logger } from './logger';
import { SyncHistory } from './services/history';
import { LogNotifier, type Notifier, WebhookNotifier } from './services/notifier';
import { createRefresher } from './services/mediaServer';
import { StrmWriter } from './services/strmWriter';
import { SyncJobs } from './sync/jobs';
import { TransferHook } from './sync/transferHook';
import { PathMapper } from './utils/pathMapper';

export interface Services {
  drive: DriveApi;
  resolver: UrlResolver;
  history: SyncHistory | null;
  notifier: Notifier;
  jobs: SyncJobs;
  transfer: TransferHook | null;
}

/** Builds the collaborators shared by the server and the one-shot CLI. */
export async function buildServices(
  config: AppConfig,
  logger: Logger,
  cipher: PayloadCipher = passthroughCipher,
): Promise<Services> {
  const transport = new FetchTransport({ cookie: config.driveCookie });
  const drive = new WebDriveApi(transport);
  const resolver = new UrlResolver({ transport, cipher, logger });
  if (cipher === passthroughCipher) {
    logger.warn('[Resolver] No payload cipher configured, app download requests go out unencrypted');
  }

  let history: SyncHistory | null = null;
  try {
    history = await SyncHistory.open(config.historyDbPath);
  } catch (e) {
    logger.warn(`[History] Disabled, cannot open ${config.historyDbPath}: ${String(e)}`);
  }

  const notifier: Notifier = config.notifyWebhookUrl
    ? new WebhookNotifier(config.notifyWebhookUrl)
    : new LogNotifier(logger);

  const jobs = new SyncJobs({ config, drive, logger, history, notifier });

  let transfer: TransferHook | null = null;
  if (config.transferMonitor.enabled && config.transferMonitor.pairs.length > 0 && config.serverAddress) {
    transfer = new TransferHook({
      writer: new StrmWriter({
        mediaExts: config.mediaExts,
        overwriteMode: config.overwriteMode,
        logger,
        tag: '[Transfer]',
      }),
      mapper: new PathMapper(config.transferMonitor.pairs),
      serverAddress: config.serverAddress,
      apiKey: config.apiKey,
      logger,
      refresher: createRefresher(config.mediaServer),
    });
  } else if (config.transferMonitor.enabled) {
    logger.warn('[Transfer] Enabled but TRANSFER_MONITOR_PATHS or SERVER_ADDRESS is missing');
  }

  return { drive, resolver, history, notifier, jobs, transfer };
}
