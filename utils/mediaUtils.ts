import path from 'path';

export const PICKCODE_LENGTH = 17;
export const RECEIVE_CODE_LENGTH = 4;
export const STRM_EXT = '.strm';

const PICKCODE_RE = /^[A-Za-z0-9]+$/;

export const DEFAULT_MEDIA_EXTS =
  'mp4,mkv,ts,iso,rmvb,avi,mov,mpeg,mpg,wmv,3gp,asf,m4v,flv,m2ts,tp,f4v';

export const isValidPickcode = (pickcode: string | undefined | null): pickcode is string =>
  typeof pickcode === 'string' && pickcode.length === PICKCODE_LENGTH && PICKCODE_RE.test(pickcode);

/**
 * Accepts both ASCII and full-width commas; entries gain a leading dot.
 * Matching stays case-sensitive, so `MKV` and `mkv` are different entries.
 */
export const parseMediaExts = (raw: string): string[] =>
  raw
    .replace(/，/g, ',')
    .split(',')
    .map((ext) => ext.trim())
    .filter((ext) => ext.length > 0 && ext !== '.')
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));

export const hasAllowedExt = (fileName: string, exts: readonly string[]): boolean => {
  const ext = path.posix.extname(fileName);
  return ext !== '' && exts.includes(ext);
};

export const strmFileName = (fileName: string): string => {
  const ext = path.posix.extname(fileName);
  const stem = ext ? fileName.slice(0, -ext.length) : fileName;
  return `${stem}${STRM_EXT}`;
};

export const buildPickcodeUrl = (serverAddress: string, apiKey: string, pickcode: string): string =>
  `${serverAddress}/redirect_url?apikey=${encodeURIComponent(apiKey)}&pickcode=${pickcode}`;

export const buildShareUrl = (
  serverAddress: string,
  apiKey: string,
  shareCode: string,
  receiveCode: string,
  fileId: string,
): string =>
  `${serverAddress}/redirect_url?apikey=${encodeURIComponent(apiKey)}` +
  `&share_code=${encodeURIComponent(shareCode)}` +
  `&receive_code=${encodeURIComponent(receiveCode)}` +
  `&id=${encodeURIComponent(fileId)}`;

/** Blu-ray disc structures live under a `BDMV` directory; a pointer cannot stand in for one. */
export const isBlurayPath = (remotePath: string): boolean =>
  remotePath.split('/').some((segment) => segment.toUpperCase() === 'BDMV');
