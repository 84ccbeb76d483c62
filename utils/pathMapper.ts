import path from 'path';
import type { PathMappingRule, PathMatch } from '../types';

const segments = (p: string): string[] => p.split('/').filter((s) => s.length > 0);

/** Segment-wise prefix test on remote (POSIX) paths: `/media` is not a prefix of `/media2`. */
export const hasPrefix = (fullPath: string, prefixPath: string): boolean => {
  const full = segments(fullPath);
  const prefix = segments(prefixPath);
  if (prefix.length > full.length) return false;
  return prefix.every((seg, i) => full[i] === seg);
};

/** Remote path below `remoteRoot`, without a leading slash. Caller checks `hasPrefix` first. */
export const relativeRemotePath = (fullPath: string, remoteRoot: string): string =>
  segments(fullPath).slice(segments(remoteRoot).length).join('/');

/** Mirrors a remote path under `localRoot`. */
export const mirrorPath = (fullPath: string, remoteRoot: string, localRoot: string): string =>
  path.join(localRoot, ...segments(relativeRemotePath(fullPath, remoteRoot)));

export const joinRemote = (parent: string, name: string): string =>
  parent === '' || parent === '/' ? `/${name}` : `${parent.replace(/\/+$/, '')}/${name}`;

export class PathMapper {
  private readonly rules: readonly PathMappingRule[];

  constructor(rules: readonly PathMappingRule[]) {
    this.rules = rules;
  }

  /** First rule in configured order wins. */
  resolve(remotePath: string): PathMatch {
    for (const rule of this.rules) {
      if (hasPrefix(remotePath, rule.remoteRoot)) {
        return { matched: true, localRoot: rule.localRoot, remoteRoot: rule.remoteRoot };
      }
    }
    return { matched: false };
  }
}
