import cron, { type ScheduledTask } from 'node-cron';
import { createApp } from './app';
import { loadConfig, type AppConfig } from './config';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { createRefresher } from './services/mediaServer';
import { StrmWriter } from './services/strmWriter';
import { TtlCache } from './services/ttlCache';
import { LifeMonitor } from './sync/lifeMonitor';
import { SupervisedService } from './sync/supervisor';
import { PathMapper } from './utils/pathMapper';
import { buildServices } from './wiring';

const ID_PATH_CACHE_CAPACITY = 4096;
const ID_PATH_CACHE_TTL_MS = 10 * 60 * 1000;

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (e) {
  createLogger().error(`[Config] ${errorMessage(e)}`);
  process.exit(1);
}

const logger = createLogger(config.log);
const { drive, history, jobs, resolver, transfer } = await buildServices(config, logger);

// --- INCREMENTAL MONITOR ---
let monitor: SupervisedService | null = null;
let lifeMonitor: LifeMonitor | null = null;
if (config.monitorLife.enabled && config.monitorLife.pairs.length > 0 && config.serverAddress && config.driveCookie) {
  lifeMonitor = new LifeMonitor({
    drive,
    writer: new StrmWriter({
      mediaExts: config.mediaExts,
      overwriteMode: config.overwriteMode,
      logger,
      tag: '[LifeMonitor]',
    }),
    mapper: new PathMapper(config.monitorLife.pairs),
    idPathCache: new TtlCache<string, string>({ capacity: ID_PATH_CACHE_CAPACITY, ttlMs: ID_PATH_CACHE_TTL_MS }),
    serverAddress: config.serverAddress,
    apiKey: config.apiKey,
    logger,
    pollIntervalMs: config.monitorLife.pollIntervalMs,
    refresher: createRefresher(config.mediaServer),
  });
  const task = lifeMonitor;
  monitor = new SupervisedService((signal) => task.run(signal), {
    name: 'LifeMonitor',
    cooldownMs: config.monitorLife.restartCooldownMs,
    logger,
  });
  monitor.start();
} else if (config.monitorLife.enabled) {
  logger.warn('[LifeMonitor] Enabled but MONITOR_LIFE_PATHS, SERVER_ADDRESS or DRIVE_COOKIE is missing');
}

const monitorStatus =
  monitor && lifeMonitor
    ? {
        status: () => ({
          ...monitor?.status(),
          counts: { ...lifeMonitor?.counts },
          cursor: lifeMonitor?.lastCursor ?? null,
        }),
      }
    : null;

const app = createApp({ config, resolver, jobs, logger, history, monitor: monitorStatus, transfer });

// --- SCHEDULE ---
const runFull = () => {
  jobs.runFull().catch((e) => logger.error(`[Jobs] ${errorMessage(e)}`));
};

const tasks: ScheduledTask[] = [];
if (config.fullSync.cron) {
  if (cron.validate(config.fullSync.cron)) {
    tasks.push(cron.schedule(config.fullSync.cron, runFull));
    logger.info(`[Cron] Full sync scheduled: ${config.fullSync.cron}`);
  } else {
    logger.warn(`[Cron] Invalid FULL_SYNC_CRON "${config.fullSync.cron}", not scheduled`);
  }
}
if (config.fullSync.onStart) setTimeout(runFull, 5000);

const server = app.listen(config.port, '0.0.0.0', () => logger.info(`[Server] Listening on ${config.port}`));

const shutdown = async (signal: string) => {
  logger.info(`[Server] ${signal} received, shutting down`);
  tasks.forEach((t) => t.stop());
  await monitor?.stop();
  server.close();
  await history?.close().catch((e) => logger.warn(`[History] ${errorMessage(e)}`));
  process.exit(0);
};

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));
