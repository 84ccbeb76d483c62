import { ConfigError } from './errors';
import type { OverwriteMode, PathMappingRule, ShareCoordinates } from './types';
import { DEFAULT_MEDIA_EXTS, parseMediaExts } from './utils/mediaUtils';

export type MediaServerType = 'emby' | 'jellyfin';

export interface AppConfig {
  port: number;
  serverAddress: string;
  apiKey: string;
  driveCookie: string;
  mediaExts: string[];
  overwriteMode: OverwriteMode;
  authFailureDelayMs: number;
  fullSync: {
    pairs: PathMappingRule[];
    cron: string | null;
    onStart: boolean;
    removeOrphans: boolean;
  };
  monitorLife: {
    enabled: boolean;
    pairs: PathMappingRule[];
    restartCooldownMs: number;
    pollIntervalMs: number;
  };
  transferMonitor: {
    enabled: boolean;
    pairs: PathMappingRule[];
  };
  share: {
    coordinates: ShareCoordinates | null;
    panPath: string;
    localPath: string;
    throttleEvery: number;
    throttleMs: number;
  };
  mediaServer: {
    type: MediaServerType;
    url: string;
    apiKey: string;
  } | null;
  notifyWebhookUrl: string | null;
  historyDbPath: string;
  log: { level: string; pretty: boolean };
}

export type Env = Record<string, string | undefined>;

/** One `localRoot#remoteRoot` per line. Lines without `#` are dropped. */
export const parsePathPairs = (raw: string | undefined): PathMappingRule[] => {
  if (!raw) return [];
  const rules: PathMappingRule[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    const sep = trimmed.indexOf('#');
    if (sep < 0) continue;
    const localRoot = trimmed.slice(0, sep).trim();
    const remoteRoot = trimmed.slice(sep + 1).trim();
    if (!localRoot || !remoteRoot) continue;
    rules.push({ localRoot, remoteRoot });
  }
  return rules;
};

/**
 * Accepts `https://host/s/<code>?password=<rc>`, `https://host/s/<code>#`
 * and the bare `<code>-<rc>` form.
 */
export const parseShareLink = (link: string): ShareCoordinates => {
  const trimmed = link.trim();
  const urlMatch = trimmed.match(/\/s\/([a-z0-9]+)/i);
  if (urlMatch) {
    const password = trimmed.match(/[?&](?:password|receive_code)=([a-z0-9]{4})/i);
    return { shareCode: urlMatch[1], receiveCode: password ? password[1] : '' };
  }
  const bare = trimmed.match(/^([a-z0-9]+)(?:-([a-z0-9]{4}))?$/i);
  if (bare) return { shareCode: bare[1], receiveCode: bare[2] ?? '' };
  throw new ConfigError(`Unrecognized share link: ${link}`);
};

const bool = (value: string | undefined, fallback = false): boolean => {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

const int = (value: string | undefined, fallback: number, name: string): number => {
  if (value === undefined || value === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) throw new ConfigError(`${name} must be a non-negative integer`);
  return parsed;
};

const overwriteMode = (value: string | undefined): OverwriteMode => {
  if (!value) return 'always';
  if (value === 'always' || value === 'never') return value;
  throw new ConfigError(`STRM_OVERWRITE_MODE must be "always" or "never", got "${value}"`);
};

const mediaServer = (env: Env): AppConfig['mediaServer'] => {
  const type = env.MEDIASERVER_TYPE;
  if (!type) return null;
  if (type !== 'emby' && type !== 'jellyfin') {
    throw new ConfigError(`MEDIASERVER_TYPE must be "emby" or "jellyfin", got "${type}"`);
  }
  if (!env.MEDIASERVER_URL || !env.MEDIASERVER_API_KEY) {
    throw new ConfigError('MEDIASERVER_URL and MEDIASERVER_API_KEY are required with MEDIASERVER_TYPE');
  }
  return { type, url: env.MEDIASERVER_URL.replace(/\/+$/, ''), apiKey: env.MEDIASERVER_API_KEY };
};

const shareCoordinates = (env: Env): ShareCoordinates | null => {
  if (env.SHARE_LINK) return parseShareLink(env.SHARE_LINK);
  if (env.SHARE_CODE) return { shareCode: env.SHARE_CODE, receiveCode: env.RECEIVE_CODE ?? '' };
  return null;
};

export function loadConfig(env: Env): AppConfig {
  const apiKey = env.API_KEY ?? '';
  if (!apiKey) throw new ConfigError('API_KEY is required');

  const mediaExts = parseMediaExts(env.MEDIA_EXTS || DEFAULT_MEDIA_EXTS);
  if (mediaExts.length === 0) throw new ConfigError('MEDIA_EXTS resolves to an empty list');

  return {
    port: int(env.PORT, 3000, 'PORT'),
    serverAddress: (env.SERVER_ADDRESS ?? '').replace(/\/+$/, ''),
    apiKey,
    driveCookie: env.DRIVE_COOKIE ?? '',
    mediaExts,
    overwriteMode: overwriteMode(env.STRM_OVERWRITE_MODE),
    authFailureDelayMs: int(env.AUTH_FAILURE_DELAY_MS, 1000, 'AUTH_FAILURE_DELAY_MS'),
    fullSync: {
      pairs: parsePathPairs(env.FULL_SYNC_PATHS),
      cron: env.FULL_SYNC_CRON || null,
      onStart: bool(env.FULL_SYNC_ON_START),
      removeOrphans: bool(env.FULL_SYNC_REMOVE_ORPHANS),
    },
    monitorLife: {
      enabled: bool(env.MONITOR_LIFE_ENABLED),
      pairs: parsePathPairs(env.MONITOR_LIFE_PATHS),
      restartCooldownMs: int(env.MONITOR_RESTART_COOLDOWN_MS, 30_000, 'MONITOR_RESTART_COOLDOWN_MS'),
      pollIntervalMs: int(env.MONITOR_POLL_INTERVAL_MS, 10_000, 'MONITOR_POLL_INTERVAL_MS'),
    },
    transferMonitor: {
      enabled: bool(env.TRANSFER_MONITOR_ENABLED),
      pairs: parsePathPairs(env.TRANSFER_MONITOR_PATHS),
    },
    share: {
      coordinates: shareCoordinates(env),
      panPath: env.SHARE_PAN_PATH ?? '',
      localPath: env.SHARE_LOCAL_PATH ?? '',
      throttleEvery: int(env.SHARE_THROTTLE_EVERY, 100, 'SHARE_THROTTLE_EVERY'),
      throttleMs: int(env.SHARE_THROTTLE_MS, 2000, 'SHARE_THROTTLE_MS'),
    },
    mediaServer: mediaServer(env),
    notifyWebhookUrl: env.NOTIFY_WEBHOOK_URL || null,
    historyDbPath: env.HISTORY_DB_PATH || './data/history.db',
    log: { level: env.LOG_LEVEL || 'info', pretty: bool(env.LOG_PRETTY) },
  };
}

/** Checks what a sync job needs before it touches the remote. */
export function requireSyncSettings(config: AppConfig, needs: { paths?: boolean } = {}): void {
  if (!config.serverAddress) throw new ConfigError('SERVER_ADDRESS is required to write pointer files');
  if (!config.driveCookie) throw new ConfigError('DRIVE_COOKIE is required for remote calls');
  if (needs.paths && config.fullSync.pairs.length === 0) throw new ConfigError('FULL_SYNC_PATHS is empty');
}
