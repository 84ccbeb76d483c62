import { NotFoundError } from '../errors';
import type { DriveApi, LifePull } from '../drive/types';
import { isAfterCursor } from '../drive/webApi';
import type { LifeCursor, RemoteFileRef, RemoteId, ShareCoordinates, ShareFileRef } from '../types';

export interface FakeFile {
  path: string;
  pickcode?: string;
  size?: number;
}

interface Node {
  id: RemoteId;
  name: string;
  isDirectory: boolean;
  pickcode?: string;
  size: number;
  children: Map<string, Node>;
}

/** In-memory drive tree for tests. The root directory has id `0`. */
export class FakeDrive implements DriveApi {
  private readonly root: Node = { id: '0', name: '', isDirectory: true, size: 0, children: new Map() };
  private readonly byId = new Map<RemoteId, { node: Node; path: string }>([['0', { node: this.root, path: '/' }]]);
  private nextId = 1;

  /** Directory path -> error thrown when it is listed. */
  readonly listErrors = new Map<string, Error>();
  /**
   * Batches handed out by `pullLifeEvents`, in order; an Error entry is thrown.
   * Events at or before the requested cursor are dropped, as the real feed does.
   */
  readonly lifeBatches: Array<LifePull['events'] | Error> = [];
  /** Cursor passed to each `pullLifeEvents` call. */
  readonly lifeCursors: LifeCursor[] = [];
  readonly calls = { getIdByPath: 0, listDirectory: 0, listShareDirectory: 0, getDirectoryPath: 0, pullLifeEvents: 0 };

  constructor(files: FakeFile[] = []) {
    for (const f of files) this.add(f);
  }

  add(file: FakeFile): RemoteId {
    const parts = file.path.split('/').filter(Boolean);
    let dir = this.root;
    let current = '';
    for (const name of parts.slice(0, -1)) {
      current = `${current}/${name}`;
      let child = dir.children.get(name);
      if (!child) {
        child = { id: `d${this.nextId++}`, name, isDirectory: true, size: 0, children: new Map() };
        dir.children.set(name, child);
        this.byId.set(child.id, { node: child, path: current });
      }
      dir = child;
    }
    const name = parts[parts.length - 1];
    const node: Node = {
      id: `f${this.nextId++}`,
      name,
      isDirectory: false,
      pickcode: file.pickcode,
      size: file.size ?? 1,
      children: new Map(),
    };
    dir.children.set(name, node);
    this.byId.set(node.id, { node, path: `${current}/${name}` });
    return node.id;
  }

  dirId(path: string): RemoteId {
    const node = this.find(path);
    if (!node || !node.isDirectory) throw new NotFoundError(`Remote directory not found: ${path}`);
    return node.id;
  }

  async getIdByPath(path: string): Promise<RemoteId> {
    this.calls.getIdByPath++;
    return this.dirId(path);
  }

  async *listDirectory(id: RemoteId, parentPath: string): AsyncIterable<RemoteFileRef> {
    this.calls.listDirectory++;
    for (const child of this.childrenOf(id, parentPath)) {
      yield {
        remoteId: child.id,
        pickcode: child.pickcode,
        name: child.name,
        parentPath,
        isDirectory: child.isDirectory,
        size: child.size,
      };
    }
  }

  async *listShareDirectory(share: ShareCoordinates, id: RemoteId, parentPath: string): AsyncIterable<ShareFileRef> {
    this.calls.listShareDirectory++;
    for (const child of this.childrenOf(id, parentPath)) {
      yield {
        fileId: child.id,
        shareCode: share.shareCode,
        receiveCode: share.receiveCode,
        name: child.name,
        parentPath,
        isDirectory: child.isDirectory,
        size: child.size,
      };
    }
  }

  async getDirectoryPath(id: RemoteId): Promise<string> {
    this.calls.getDirectoryPath++;
    const entry = this.byId.get(id);
    if (!entry || !entry.node.isDirectory) throw new NotFoundError(`Remote directory ${id} not found`);
    return entry.path;
  }

  async pullLifeEvents(cursor: LifeCursor): Promise<LifePull> {
    this.calls.pullLifeEvents++;
    this.lifeCursors.push(cursor);
    const next = this.lifeBatches.shift();
    if (next instanceof Error) throw next;
    const events = (next ?? []).filter((e) => isAfterCursor(e, cursor));
    const last = events[events.length - 1];
    return { events, cursor: last ? { fromTime: last.updateTime, fromId: last.id } : cursor };
  }

  private childrenOf(id: RemoteId, parentPath: string): Node[] {
    const error = this.listErrors.get(parentPath);
    if (error) throw error;
    const entry = this.byId.get(id);
    if (!entry) throw new NotFoundError(`Remote directory ${id} not found`);
    return [...entry.node.children.values()];
  }

  private find(path: string): Node | undefined {
    let node: Node | undefined = this.root;
    for (const name of path.split('/').filter(Boolean)) {
      node = node?.children.get(name);
    }
    return node;
  }
}
