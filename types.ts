export type RemoteId = string;

export interface RemoteFileRef {
  remoteId: RemoteId;
  // Listing APIs disagree on the field name (pickcode / pick_code / pc); normalized here.
  pickcode?: string;
  name: string;
  parentPath: string;
  isDirectory: boolean;
  size: number;
}

export interface ShareFileRef {
  fileId: RemoteId;
  shareCode: string;
  receiveCode: string;
  name: string;
  parentPath: string;
  isDirectory: boolean;
  size: number;
}

export interface PathMappingRule {
  localRoot: string;
  remoteRoot: string;
}

export type PathMatch =
  | { matched: true; localRoot: string; remoteRoot: string }
  | { matched: false };

export interface ShareCoordinates {
  shareCode: string;
  receiveCode: string;
}

export interface DirectUrl {
  url: string;
  fileName: string;
  fileSize?: number;
  fileId?: string;
  pickcode?: string;
}

export type AppVariant = 'chrome' | 'android' | (string & {});

export const LIFE_EVENT_TYPES = {
  uploadImage: 1,
  uploadFile: 2,
  moveFile: 6,
  receiveFiles: 14,
} as const;

export interface LifeEvent {
  id: number;
  type: number;
  pickcode: string;
  fileName: string;
  parentId: RemoteId;
  updateTime: number;
}

export interface LifeCursor {
  fromTime: number;
  fromId: number;
}

export type OverwriteMode = 'always' | 'never';

export type SyncKind = 'full' | 'share' | 'increment';

export interface SyncCounts {
  generated: number;
  skipped: number;
  failed: number;
  removed: number;
}

export interface SyncStatus {
  isRunning: boolean;
  step: string;
  counts: SyncCounts;
  error: string | null;
}

export interface SyncRunRecord extends SyncCounts {
  id?: number;
  kind: SyncKind;
  startedAt: number;
  finishedAt: number;
  error: string | null;
}

export const emptyCounts = (): SyncCounts => ({ generated: 0, skipped: 0, failed: 0, removed: 0 });

export interface SyncReport {
  counts: SyncCounts;
  errors: string[];
}
