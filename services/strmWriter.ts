import fs from 'fs/promises';
import path from 'path';
import { FilesystemError, ValidationError } from '../errors';
import type { Logger } from '../logger';
import type { OverwriteMode } from '../types';
import { hasAllowedExt, isValidPickcode, strmFileName } from '../utils/mediaUtils';

export type WriteResult =
  | { status: 'written'; path: string }
  | { status: 'skipped'; path: string; reason: 'extension' | 'exists' };

export interface StrmWriterOptions {
  mediaExts: readonly string[];
  overwriteMode?: OverwriteMode;
  logger: Logger;
  tag?: string;
}

/** Path of the pointer file that stands in for `mediaPath`. */
export const strmPathFor = (mediaPath: string): string =>
  path.join(path.dirname(mediaPath), strmFileName(path.basename(mediaPath)));

export class StrmWriter {
  private readonly mediaExts: readonly string[];
  private readonly overwriteMode: OverwriteMode;
  private readonly logger: Logger;
  private readonly tag: string;

  constructor(options: StrmWriterOptions) {
    this.mediaExts = options.mediaExts;
    this.overwriteMode = options.overwriteMode ?? 'always';
    this.logger = options.logger;
    this.tag = options.tag ?? '[StrmWriter]';
  }

  accepts(fileName: string): boolean {
    return hasAllowedExt(fileName, this.mediaExts);
  }

  /**
   * Writes the pointer file for the media file that would live at `mediaPath`.
   * Re-checks the extension allow-list, and the pickcode when one is given,
   * whatever the caller already checked.
   *
   * @throws ValidationError on a malformed pickcode
   * @throws FilesystemError when the directory or file cannot be written
   */
  async write(mediaPath: string, url: string, pickcode?: string): Promise<WriteResult> {
    const target = strmPathFor(mediaPath);

    if (!this.accepts(path.basename(mediaPath))) {
      this.logger.warn(`${this.tag} Extension not allowed, skipping: ${mediaPath}`);
      return { status: 'skipped', path: target, reason: 'extension' };
    }
    if (pickcode !== undefined && !isValidPickcode(pickcode)) {
      throw new ValidationError(`Bad pickcode "${pickcode}" for ${path.basename(mediaPath)}`);
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      if (this.overwriteMode === 'never' && (await exists(target))) {
        this.logger.debug(`${this.tag} Pointer exists, leaving as is: ${target}`);
        return { status: 'skipped', path: target, reason: 'exists' };
      }
      // 'w' truncates: a retried write replaces whatever a failed one left.
      await fs.writeFile(target, url, { encoding: 'utf-8', flag: 'w' });
    } catch (err) {
      throw new FilesystemError(target, err);
    }
    this.logger.info(`${this.tag} Wrote ${target}`);
    return { status: 'written', path: target };
  }
}

const exists = async (p: string): Promise<boolean> => {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
};
