import { AuthError, UpstreamError } from '../errors';
import { errnoOf, isRecord } from './envelope';
import type { DriveTransport, Json, Query } from './types';

// errno values the remote uses for an expired or rejected session.
const LOGGED_OUT_ERRNOS = new Set([99, 990001]);

export interface FetchTransportOptions {
  cookie: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class FetchTransport implements DriveTransport {
  private readonly cookie: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.cookie = options.cookie;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getJson(url: string, query: Query = {}, headers: Record<string, string> = {}): Promise<Json> {
    const params = new URLSearchParams();
    for (const [k, v] of Object.entries(query)) params.set(k, String(v));
    const qs = params.toString();
    return this.request(qs ? `${url}?${qs}` : url, { method: 'GET', headers });
  }

  async postForm(url: string, form: Record<string, string>, headers: Record<string, string> = {}): Promise<Json> {
    return this.request(url, {
      method: 'POST',
      headers: { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams(form).toString(),
    });
  }

  private async request(url: string, init: { method: string; headers: Record<string, string>; body?: string }): Promise<Json> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        ...init,
        headers: { ...init.headers, Cookie: this.cookie },
        signal: controller.signal,
      });
    } catch (err) {
      throw new UpstreamError(`${init.method} ${url} failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      clearTimeout(timeout);
    }

    if (res.status === 401 || res.status === 403) {
      throw new AuthError(`Remote rejected credentials (HTTP ${res.status})`);
    }
    if (res.status >= 400) {
      const text = await res.text().catch(() => '');
      throw new UpstreamError(`HTTP Error ${res.status}: ${text.slice(0, 200)}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new UpstreamError(`${init.method} ${url}: response is not JSON`);
    }
    if (!isRecord(body)) throw new UpstreamError(`${init.method} ${url}: unexpected response shape`);

    const errno = errnoOf(body);
    if (errno !== undefined && LOGGED_OUT_ERRNOS.has(errno)) {
      throw new AuthError(`Remote session rejected (errno ${errno})`);
    }
    return body;
  }
}
