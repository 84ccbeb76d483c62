import path from 'path';
import { errorMessage, ValidationError } from '../errors';
import type { Logger } from '../logger';
import { refreshLibrary, type MediaServerRefresher } from '../services/mediaServer';
import type { StrmWriter } from '../services/strmWriter';
import { buildPickcodeUrl, isBlurayPath, isValidPickcode } from '../utils/mediaUtils';
import { mirrorPath, type PathMapper } from '../utils/pathMapper';

/** A file that finished transferring into the drive. */
export interface TransferNotice {
  /** Absolute remote path of the file, name included. */
  path: string;
  pickcode: string;
}

export type TransferOutcome =
  | { status: 'written'; path: string }
  | { status: 'skipped'; reason: 'unmapped' | 'bluray' | 'extension' | 'exists' };

export interface TransferHookOptions {
  writer: StrmWriter;
  mapper: PathMapper;
  serverAddress: string;
  apiKey: string;
  logger: Logger;
  refresher?: MediaServerRefresher | null;
}

const TAG = '[Transfer]';

export class TransferHook {
  constructor(private readonly options: TransferHookOptions) {}

  /**
   * Writes the pointer for a transferred file under its mapped local root and
   * asks the media server to pick it up.
   *
   * @throws ValidationError when the path is not absolute or the pickcode is unusable
   */
  async handle(notice: TransferNotice): Promise<TransferOutcome> {
    const { writer, mapper, serverAddress, apiKey, logger } = this.options;
    const remotePath = notice.path.trim();
    const name = path.posix.basename(remotePath);
    if (!remotePath.startsWith('/') || !name) throw new ValidationError(`Bad path: ${notice.path}`);

    const match = mapper.resolve(remotePath);
    if (!match.matched) {
      logger.debug(`${TAG} ${name} is outside every mapped root, skipping`);
      return { status: 'skipped', reason: 'unmapped' };
    }
    if (isBlurayPath(remotePath)) {
      logger.warn(`${TAG} ${name} belongs to a Blu-ray disc structure, no pointer written: ${remotePath}`);
      return { status: 'skipped', reason: 'bluray' };
    }
    if (!notice.pickcode) throw new ValidationError(`${name} has no pickcode`);
    if (!isValidPickcode(notice.pickcode)) throw new ValidationError(`Bad pickcode: ${notice.pickcode}`);

    const result = await writer.write(
      mirrorPath(remotePath, match.remoteRoot, match.localRoot),
      buildPickcodeUrl(serverAddress, apiKey, notice.pickcode),
      notice.pickcode,
    );
    if (result.status === 'skipped') return { status: 'skipped', reason: result.reason };

    await this.refresh(result.path);
    return { status: 'written', path: result.path };
  }

  private async refresh(strmPath: string): Promise<void> {
    const { refresher, logger } = this.options;
    if (!refresher) return;
    try {
      await refreshLibrary(refresher, [strmPath]);
    } catch (err) {
      logger.warn(`${TAG} ${refresher.name} refresh failed: ${errorMessage(err)}`);
    }
  }
}
