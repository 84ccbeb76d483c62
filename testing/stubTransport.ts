import type { DriveTransport, Json, Query } from '../drive/types';

export interface RecordedCall {
  method: 'GET' | 'POST';
  url: string;
  params: Record<string, string | number>;
  headers: Record<string, string>;
}

type Reply = Json | Error;

/**
 * Replays queued envelopes per URL. Parameters are copied at call time, so a
 * caller that mutates its query afterwards does not change the record.
 */
export class StubTransport implements DriveTransport {
  readonly calls: RecordedCall[] = [];
  private readonly replies = new Map<string, Reply[]>();

  reply(url: string, ...envelopes: Reply[]): this {
    this.replies.set(url, [...(this.replies.get(url) ?? []), ...envelopes]);
    return this;
  }

  callsTo(url: string): RecordedCall[] {
    return this.calls.filter((c) => c.url === url);
  }

  async getJson(url: string, query: Query = {}, headers: Record<string, string> = {}): Promise<Json> {
    this.calls.push({ method: 'GET', url, params: { ...query }, headers: { ...headers } });
    return this.next(url);
  }

  async postForm(url: string, form: Record<string, string>, headers: Record<string, string> = {}): Promise<Json> {
    this.calls.push({ method: 'POST', url, params: { ...form }, headers: { ...headers } });
    return this.next(url);
  }

  private next(url: string): Json {
    const queue = this.replies.get(url);
    const reply = queue?.shift();
    if (!reply) throw new Error(`No stubbed reply for ${url}`);
    if (reply instanceof Error) throw reply;
    return reply;
  }
}
