import type {
  LifeCursor,
  LifeEvent,
  RemoteFileRef,
  RemoteId,
  ShareCoordinates,
  ShareFileRef,
} from '../types';

export type Json = Record<string, unknown>;

export type Query = Record<string, string | number>;

/** Raw HTTP access to the remote service; resolves to the parsed JSON envelope. */
export interface DriveTransport {
  getJson(url: string, query?: Query, headers?: Record<string, string>): Promise<Json>;
  postForm(url: string, form: Record<string, string>, headers?: Record<string, string>): Promise<Json>;
}

/** Envelope cipher used by the app download APIs. */
export interface PayloadCipher {
  encrypt(plain: string): string;
  decrypt(data: string): string;
}

export interface LifePull {
  events: LifeEvent[];
  cursor: LifeCursor;
}

/** The remote capabilities the sync engines consume. */
export interface DriveApi {
  getIdByPath(path: string): Promise<RemoteId>;
  /** Immediate children of directory `id`, whose absolute path is `parentPath`. */
  listDirectory(id: RemoteId, parentPath: string): AsyncIterable<RemoteFileRef>;
  listShareDirectory(share: ShareCoordinates, id: RemoteId, parentPath: string): AsyncIterable<ShareFileRef>;
  getDirectoryPath(id: RemoteId): Promise<string>;
  pullLifeEvents(cursor: LifeCursor): Promise<LifePull>;
}
