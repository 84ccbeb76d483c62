import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type { Logger } from './logger';
import { STRM_EXT } from './utils/mediaUtils';

/**
 * Collects every pointer file under `root`. Used by the orphan sweep; a
 * missing root yields an empty list.
 */
export async function scanStrmFiles(root: string, logger: Logger): Promise<string[]> {
  const absoluteRoot = path.resolve(root);
  const results: string[] = [];

  async function walk(dir: string): Promise<void> {
    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(dir, { withFileTypes: true });
    } catch (e) {
      const code = e instanceof Error && 'code' in e ? e.code : undefined;
      if (code !== 'ENOENT') logger.warn(`[Scanner] Cannot read ${dir}: ${String(e)}`);
      return;
    }

    for (const dirent of dirents) {
      const res = path.join(dir, dirent.name);
      if (dirent.isDirectory()) {
        await walk(res);
      } else if (dirent.isFile() && path.extname(dirent.name) === STRM_EXT) {
        results.push(res);
      }
    }
  }

  await walk(absoluteRoot);
  logger.debug(`[Scanner] Found ${results.length} pointer files under ${absoluteRoot}`);
  return results;
}

/** Deletes every pointer file under `root` not in `keep`. Returns the count removed. */
export async function removeOrphans(
  root: string,
  keep: ReadonlySet<string>,
  logger: Logger,
): Promise<number> {
  const existing = await scanStrmFiles(root, logger);
  let removed = 0;
  for (const file of existing) {
    if (keep.has(path.resolve(file))) continue;
    try {
      await fs.unlink(file);
      removed++;
      logger.info(`[Scanner] Removed orphaned pointer: ${file}`);
    } catch (e) {
      logger.error(`[Scanner] Failed to remove ${file}: ${String(e)}`);
    }
  }
  return removed;
}
