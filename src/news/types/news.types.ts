export interface FeedSource {
  name: string;
  url: string;
  tags: string[];
  limit?: number;
}

export interface RawEntry {
  /** Already normalized by the fetcher. */
  title: string;
  link: string;
  /** Raw markup as found in the feed. */
  summary: string;
  guid: string;
  publishedAt: string | null;
  sourceName: string;
  order: number;
}

export interface SourceFeed {
  source: FeedSource;
  sourceIndex: number;
  entries: RawEntry[];
  failed: boolean;
}

export interface Candidate {
  title: string;
  body: string;
  link: string;
  sourceName: string;
  sourceIndex: number;
  entryIndex: number;
  tags: string[];
  fingerprint: string;
  score: number;
  publishedAt: string | null;
}

export interface DeliveryRecord {
  fingerprint: string;
  title: string;
  link: string;
  source: string;
  deliveredAt: string;
}

export type DeliveryMetadata = Omit<
  DeliveryRecord,
  'fingerprint' | 'deliveredAt'
> & {
  deliveredAt?: string;
};

export type RecordOutcome = 'recorded' | 'already_exists';

export type SendResult = { ok: true } | { ok: false; error: string };

export interface DeliveryChannel {
  send(
    text: string,
    options: { allowLinkPreview: boolean },
  ): Promise<SendResult>;
}

export type RunStage =
  | 'idle'
  | 'fetching'
  | 'selecting'
  | 'delivering'
  | 'failed';

export type RunStatus = 'delivered' | 'idle' | 'skipped' | 'failed';

export interface RunStats {
  sources: number;
  failedSources: number;
  fetched: number;
  candidates: number;
  eligible: number;
  alreadyDelivered: number;
  sendFailures: number;
}

export type DeliveredItem = Pick<
  Candidate,
  'fingerprint' | 'title' | 'link' | 'sourceName' | 'score'
>;

export interface RunResult {
  status: RunStatus;
  delivered: number;
  skippedReason?: string;
  error?: string;
  deliveredItems: DeliveredItem[];
  stats: RunStats;
}

export interface RunOptions {
  maxDeliveries?: number;
  minScore?: number;
  dryRun?: boolean;
}
