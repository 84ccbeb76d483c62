import { NotFoundError } from '../errors';
import type {
  LifeCursor,
  LifeEvent,
  RemoteFileRef,
  RemoteId,
  ShareCoordinates,
  ShareFileRef,
} from '../types';
import { joinRemote } from '../utils/pathMapper';
import { asNumber, asString, assertOk, getFirst, isRecord, listOf } from './envelope';
import type { DriveApi, DriveTransport, Json, LifePull } from './types';

const WEB_API = 'https://webapi.115.com';
const PAGE_SIZE = 1000;

/**
 * Listing items mark files by `fid` and directories by their own `cid`.
 * The pickcode comes back as `pickcode`, `pick_code` or `pc` depending on the call.
 */
export const pickcodeOf = (item: Json): string | undefined => {
  const value = asString(getFirst(item, 'pickcode', 'pick_code', 'pc'));
  return value || undefined;
};

const isDirectoryItem = (item: Json): boolean => {
  if ('is_dir' in item || 'is_directory' in item) {
    return Boolean(getFirst(item, 'is_dir', 'is_directory'));
  }
  return !('fid' in item);
};

export const toRemoteFileRef = (item: Json, parentPath: string): RemoteFileRef => {
  const isDirectory = isDirectoryItem(item);
  return {
    remoteId: asString(isDirectory ? getFirst(item, 'cid', 'id') : getFirst(item, 'fid', 'id')),
    pickcode: pickcodeOf(item),
    name: asString(getFirst(item, 'n', 'name', 'file_name')),
    parentPath,
    isDirectory,
    size: asNumber(getFirst(item, 's', 'size', 'file_size')),
  };
};

export class WebDriveApi implements DriveApi {
  constructor(private readonly transport: DriveTransport) {}

  async getIdByPath(path: string): Promise<RemoteId> {
    const env = await this.transport.getJson(`${WEB_API}/files/getid`, { path });
    assertOk(env, `getid ${path}`);
    const id = asString(env.id);
    const isRoot = path.split('/').filter(Boolean).length === 0;
    if (!id || (id === '0' && !isRoot)) throw new NotFoundError(`Remote directory not found: ${path}`);
    return id;
  }

  async *listDirectory(id: RemoteId, parentPath: string): AsyncIterable<RemoteFileRef> {
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const env = await this.transport.getJson(`${WEB_API}/files`, {
        aid: 1,
        cid: id,
        offset,
        limit: PAGE_SIZE,
        show_dir: 1,
        o: 'user_ptime',
        asc: 1,
        format: 'json',
      });
      assertOk(env, `list ${parentPath}`);
      const items = listOf(env.data);
      for (const item of items) yield toRemoteFileRef(item, parentPath);
      if (items.length < PAGE_SIZE || offset + items.length >= asNumber(env.count)) return;
    }
  }

  async *listShareDirectory(
    share: ShareCoordinates,
    id: RemoteId,
    parentPath: string,
  ): AsyncIterable<ShareFileRef> {
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const env = await this.transport.getJson(`${WEB_API}/share/snap`, {
        share_code: share.shareCode,
        receive_code: share.receiveCode,
        cid: id,
        offset,
        limit: PAGE_SIZE,
      });
      assertOk(env, `share snap ${share.shareCode}`);
      const data = isRecord(env.data) ? env.data : {};
      const items = listOf(data.list);
      for (const item of items) {
        const ref = toRemoteFileRef(item, parentPath);
        yield {
          fileId: ref.remoteId,
          shareCode: share.shareCode,
          receiveCode: share.receiveCode,
          name: ref.name,
          parentPath,
          isDirectory: ref.isDirectory,
          size: ref.size,
        };
      }
      if (items.length < PAGE_SIZE || offset + items.length >= asNumber(data.count)) return;
    }
  }

  async getDirectoryPath(id: RemoteId): Promise<string> {
    const env = await this.transport.getJson(`${WEB_API}/files`, {
      aid: 1,
      cid: id,
      offset: 0,
      limit: 1,
      show_dir: 1,
      format: 'json',
    });
    assertOk(env, `path of ${id}`);
    // An unknown cid silently falls back to the root listing.
    if (asString(env.cid) !== String(id)) throw new NotFoundError(`Remote directory ${id} not found`);
    const ancestors = listOf(env.path).filter((p) => asString(p.cid) !== '0');
    return ancestors.reduce((acc, p) => joinRemote(acc, asString(p.name)), '/');
  }

  /**
   * The feed is served newest first, so paging stops at the first page that
   * reaches back to the cursor or runs short.
   */
  async pullLifeEvents(cursor: LifeCursor): Promise<LifePull> {
    let next = cursor;
    const events: LifeEvent[] = [];
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const env = await this.transport.getJson(`${WEB_API}/behavior/detail`, {
        type: '',
        limit: PAGE_SIZE,
        offset,
        date: '',
      });
      assertOk(env, 'behavior detail');
      const data = isRecord(env.data) ? env.data : {};
      const items = listOf(data.list);

      let reachedCursor = false;
      for (const item of items) {
        const event: LifeEvent = {
          id: asNumber(item.id),
          type: asNumber(item.type),
          pickcode: pickcodeOf(item) ?? '',
          fileName: asString(item.file_name),
          parentId: asString(item.parent_id),
          updateTime: asNumber(item.update_time),
        };
        if (!isAfterCursor(event, cursor)) {
          reachedCursor = true;
          continue;
        }
        events.push(event);
        if (isAfterCursor(event, next)) next = { fromTime: event.updateTime, fromId: event.id };
      }
      if (reachedCursor || items.length < PAGE_SIZE) break;
    }
    // Oldest first.
    events.sort((a, b) => a.updateTime - b.updateTime || a.id - b.id);
    return { events, cursor: next };
  }
}

export const isAfterCursor = (event: LifeEvent, cursor: LifeCursor): boolean =>
  event.updateTime > cursor.fromTime ||
  (event.updateTime === cursor.fromTime && event.id > cursor.fromId);
