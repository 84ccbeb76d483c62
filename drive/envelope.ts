import { UpstreamError } from '../errors';
import type { Json, PayloadCipher } from './types';

export const isRecord = (value: unknown): value is Json =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const getFirst = (m: Json, ...keys: string[]): unknown => {
  for (const key of keys) {
    if (key in m) return m[key];
  }
  return undefined;
};

export const asString = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return '';
};

export const asNumber = (value: unknown): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
};

export const errnoOf = (env: Json): number | undefined => {
  const raw = getFirst(env, 'errno', 'errNo', 'code');
  const n = asNumber(raw);
  return n === 0 ? undefined : n;
};

export const isOk = (env: Json): boolean => env.state === true || env.state === 1;

export const describe = (env: Json): string => {
  const msg = asString(getFirst(env, 'error', 'msg', 'message'));
  const errno = errnoOf(env);
  return [msg || 'remote call failed', errno !== undefined ? `(errno ${errno})` : '']
    .filter(Boolean)
    .join(' ');
};

export const assertOk = (env: Json, what: string): void => {
  if (!isOk(env)) throw new UpstreamError(`${what}: ${describe(env)}`, errnoOf(env));
};

export const listOf = (value: unknown): Json[] =>
  Array.isArray(value) ? value.filter(isRecord) : [];

/** Unwraps an envelope `data` field that is either ciphered JSON text or already an object. */
export const decodeData = (data: unknown, cipher: PayloadCipher, what: string): Json => {
  if (isRecord(data)) return data;
  if (typeof data !== 'string' || data === '') {
    throw new UpstreamError(`${what}: response carries no data`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(cipher.decrypt(data));
  } catch (err) {
    throw new UpstreamError(`${what}: undecodable data (${err instanceof Error ? err.message : String(err)})`);
  }
  if (!isRecord(parsed)) throw new UpstreamError(`${what}: unexpected data shape`);
  return parsed;
};
