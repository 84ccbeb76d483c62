import { UpstreamError } from '../errors';
import type { Logger } from '../logger';
import type { SyncCounts, SyncKind } from '../types';

export interface SyncSummary {
  kind: SyncKind;
  counts: SyncCounts;
  errors: string[];
  durationMs: number;
}

export interface Notifier {
  notify(summary: SyncSummary): Promise<void>;
}

const TITLES: Record<SyncKind, string> = {
  full: 'Full sync finished',
  share: 'Share sync finished',
  increment: 'Incremental sync finished',
};

export function formatSummary(summary: SyncSummary): { title: string; text: string } {
  const { counts } = summary;
  const lines = [
    `Generated ${counts.generated} pointer files`,
    `Skipped ${counts.skipped}`,
    `Failed ${counts.failed}`,
  ];
  if (counts.removed !== 0) lines.push(`Removed ${counts.removed} orphaned pointer files`);
  if (summary.errors.length > 0) lines.push(`Errors: ${summary.errors.join('; ')}`);
  return { title: TITLES[summary.kind], text: lines.join('\n') };
}

export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async notify(summary: SyncSummary): Promise<void> {
    const { title, text } = formatSummary(summary);
    this.logger.info(`[Notify] ${title} in ${Math.round(summary.durationMs / 1000)}s\n${text}`);
  }
}

/** POSTs `{ title, text, kind, counts, errors }` as JSON. */
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly url: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async notify(summary: SyncSummary): Promise<void> {
    const { title, text } = formatSummary(summary);
    const res = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ title, text, kind: summary.kind, counts: summary.counts, errors: summary.errors }),
    });
    if (!res.ok) throw new UpstreamError(`Webhook responded with ${res.status} ${res.statusText}`);
  }
}
