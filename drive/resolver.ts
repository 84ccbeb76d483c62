import { NotFoundError, UpstreamError, ValidationError } from '../errors';
import type { Logger } from '../logger';
import type { AppVariant, DirectUrl } from '../types';
import { isValidPickcode, RECEIVE_CODE_LENGTH } from '../utils/mediaUtils';
import { asNumber, asString, assertOk, decodeData, errnoOf, getFirst, isOk, isRecord, listOf } from './envelope';
import type { DriveTransport, Json, PayloadCipher } from './types';

const PRO_API = 'http://proapi.115.com';
const SHARE_API = 'http://web.api.115.com/share';

/** Share download answered with a receive code that is no longer valid. */
export const ERRNO_STALE_RECEIVE_CODE = 4100008;
/** Share search does not support the `suffix` filter for this share. */
export const ERRNO_SUFFIX_UNSUPPORTED = 20021;

const APP_VARIANT = /^[a-z0-9_]+$/i;

/** The variant becomes a path segment of the upstream url. */
const checkAppVariant = (app: string): void => {
  if (app && !APP_VARIANT.test(app)) throw new ValidationError(`Bad app: ${app}`);
};

export interface ShareRequest {
  shareCode: string;
  receiveCode?: string;
  fileId?: string;
  fileName?: string;
  app?: AppVariant;
}

export interface UrlResolverOptions {
  transport: DriveTransport;
  cipher: PayloadCipher;
  logger: Logger;
}

const fileNameFromUrl = (url: string): string => {
  try {
    const last = new URL(url).pathname.split('/').pop() ?? '';
    return decodeURIComponent(last);
  } catch {
    return '';
  }
};

export class UrlResolver {
  private readonly transport: DriveTransport;
  private readonly cipher: PayloadCipher;
  private readonly logger: Logger;

  constructor(options: UrlResolverOptions) {
    this.transport = options.transport;
    this.cipher = options.cipher;
    this.logger = options.logger;
  }

  async resolvePickcode(pickcode: string, userAgent: string, app: AppVariant = 'android'): Promise<DirectUrl> {
    if (!isValidPickcode(pickcode)) throw new ValidationError(`Bad pickcode: ${pickcode}`);
    checkAppVariant(app);
    const pc = pickcode.toLowerCase();
    const headers = { 'User-Agent': userAgent };

    if (app === 'chrome') {
      const env = await this.transport.postForm(
        `${PRO_API}/app/chrome/downurl`,
        { data: this.cipher.encrypt(JSON.stringify({ pickcode: pc })) },
        headers,
      );
      assertOk(env, `downurl ${pc}`);
      const data = decodeData(env.data, this.cipher, `downurl ${pc}`);
      const info = Object.values(data).find(isRecord);
      const urlInfo = info ? info.url : undefined;
      const url = isRecord(urlInfo) ? asString(urlInfo.url) : '';
      if (!info || !url) throw new NotFoundError(`No download url for pickcode ${pc}`);
      return {
        url,
        fileName: asString(info.file_name) || fileNameFromUrl(url),
        fileSize: asNumber(info.file_size),
        pickcode: pc,
      };
    }

    const env = await this.transport.postForm(
      `${PRO_API}/${app || 'android'}/2.0/ufile/download`,
      { data: this.cipher.encrypt(JSON.stringify({ pick_code: pc })) },
      headers,
    );
    assertOk(env, `download ${pc}`);
    const data = decodeData(env.data, this.cipher, `download ${pc}`);
    const url = asString(data.url);
    if (!url) throw new NotFoundError(`No download url for pickcode ${pc}`);
    return {
      url,
      fileName: fileNameFromUrl(url),
      fileSize: asNumber(data.file_size) || undefined,
      pickcode: pc,
    };
  }

  async resolveShare(request: ShareRequest): Promise<DirectUrl> {
    const { shareCode, fileName, app = '' } = request;
    checkAppVariant(app);
    let receiveCode = request.receiveCode ?? '';

    if (!receiveCode) {
      receiveCode = await this.getReceiveCode(shareCode);
    } else if (receiveCode.length !== RECEIVE_CODE_LENGTH) {
      throw new ValidationError(`Bad receive_code: ${receiveCode}`);
    }

    let fileId = request.fileId ?? '';
    if (!fileId && fileName) {
      fileId = await this.findShareFileId(shareCode, receiveCode, fileName);
    }
    if (!fileId) throw new ValidationError(`Please specify id or name: share_code=${shareCode}`);

    try {
      return await this.shareDownUrl(shareCode, receiveCode, fileId, app);
    } catch (err) {
      if (!(err instanceof UpstreamError) || err.errno !== ERRNO_STALE_RECEIVE_CODE) throw err;
      this.logger.info(`[Resolver] Receive code for ${shareCode} is stale, fetching a fresh one`);
      const fresh = await this.getReceiveCode(shareCode);
      return this.shareDownUrl(shareCode, fresh, fileId, app);
    }
  }

  async getReceiveCode(shareCode: string): Promise<string> {
    const env = await this.transport.getJson(`${SHARE_API}/shareinfo`, { share_code: shareCode });
    if (!isOk(env)) throw new NotFoundError(`Share ${shareCode} not found`);
    const data = isRecord(env.data) ? env.data : {};
    const receiveCode = asString(data.receive_code);
    if (!receiveCode) throw new NotFoundError(`Share ${shareCode} has no receive code`);
    return receiveCode;
  }

  /**
   * Searches the share for `name`, narrowed by its extension when that is
   * alphanumeric. Only an exact name match counts.
   */
  async findShareFileId(shareCode: string, receiveCode: string, name: string, parentId = '0'): Promise<string> {
    const query: Record<string, string | number> = {
      share_code: shareCode,
      receive_code: receiveCode,
      search_value: name,
      cid: parentId,
      limit: 1,
      type: 99,
    };
    const dot = name.lastIndexOf('.');
    const suffix = dot >= 0 ? name.slice(dot + 1) : name;
    if (/^[A-Za-z0-9]+$/.test(suffix)) query.suffix = suffix;

    let env = await this.transport.getJson(`${SHARE_API}/search`, query);
    if (errnoOf(env) === ERRNO_SUFFIX_UNSUPPORTED && 'suffix' in query) {
      delete query.suffix;
      env = await this.transport.getJson(`${SHARE_API}/search`, query);
    }

    const data = isRecord(env.data) ? env.data : {};
    if (!isOk(env) || !asNumber(data.count)) throw new NotFoundError(`Not found in share ${shareCode}: ${name}`);
    const first = listOf(data.list)[0];
    if (!first || asString(getFirst(first, 'n', 'name')) !== name) {
      throw new NotFoundError(`name not found: ${name}`);
    }
    return asString(getFirst(first, 'fid', 'id'));
  }

  private async shareDownUrl(shareCode: string, receiveCode: string, fileId: string, app: string): Promise<DirectUrl> {
    const payload = { share_code: shareCode, receive_code: receiveCode, file_id: fileId };
    let env: Json;
    if (app) {
      env = await this.transport.getJson(`${PRO_API}/${app}/2.0/share/downurl`, payload);
    } else {
      env = await this.transport.postForm(`${PRO_API}/app/share/downurl`, {
        data: this.cipher.encrypt(JSON.stringify(payload)),
      });
    }
    assertOk(env, `share downurl ${shareCode}/${fileId}`);

    const data = decodeData(env.data, this.cipher, `share downurl ${shareCode}/${fileId}`);
    const urlInfo = data.url;
    const url = isRecord(urlInfo) ? asString(urlInfo.url) : '';
    if (!url) throw new NotFoundError(`No download url for ${shareCode}/${fileId}`);
    return {
      url,
      fileName: asString(data.fn) || fileNameFromUrl(url),
      fileSize: asNumber(data.fs),
      fileId: asString(data.fid) || fileId,
    };
  }
}
