import path from 'node:path';

function clampInt(
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  const parsed = Number(raw ?? fallback);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.floor(parsed)));
}

export const SERVICE_NAME = 'tech-news-relay';

export const MIN_SCORE = clampInt(process.env.MIN_SCORE, 3, 0, 100);
export const MAX_DELIVERIES_PER_RUN = clampInt(
  process.env.MAX_DELIVERIES_PER_RUN,
  1,
  1,
  3,
);
export const ENTRIES_PER_SOURCE = clampInt(
  process.env.ENTRIES_PER_SOURCE,
  5,
  3,
  15,
);
export const FEED_FETCH_TIMEOUT_MS =
  clampInt(process.env.FEED_FETCH_TIMEOUT_SEC, 12, 1, 60) * 1000;
export const FEED_USER_AGENT =
  process.env.FEED_USER_AGENT ?? 'tech-news-relay/1.0';

export const TITLE_MAX_CHARS = 200;
export const SUMMARY_MAX_CHARS = clampInt(
  process.env.SUMMARY_MAX_CHARS,
  800,
  100,
  3500,
);
export const MESSAGE_MAX_CHARS = clampInt(
  process.env.MESSAGE_MAX_CHARS,
  4096,
  512,
  4096,
);
export const FINGERPRINT_BODY_CHARS = 1000;
export const LONG_BODY_THRESHOLD = 300;
export const SENTENCE_CUT_MIN_RATIO = 0.7;
export const ELLIPSIS = '…';

export const ALLOW_LINK_PREVIEW = process.env.ALLOW_LINK_PREVIEW !== '0';
export const DEDUPE_BY_LINK = process.env.DEDUPE_BY_LINK === '1';
export const RETENTION_DAYS = clampInt(process.env.RETENTION_DAYS, 90, 1, 3650);

const dataDir = process.env.DATA_DIR ?? path.join(process.cwd(), 'data');
export const DELIVERY_DB_PATH =
  process.env.DELIVERY_DB_PATH ?? path.join(dataDir, 'deliveries.db');

export const TELEGRAM_API_BASE =
  process.env.TELEGRAM_API_BASE ?? 'https://api.telegram.org';
export const TELEGRAM_TIMEOUT_MS =
  clampInt(process.env.TELEGRAM_TIMEOUT_SEC, 15, 1, 120) * 1000;
export const TELEGRAM_MAX_RETRIES = clampInt(
  process.env.TELEGRAM_MAX_RETRIES,
  2,
  0,
  5,
);
export const TELEGRAM_RETRY_BACKOFF_MS =
  clampInt(process.env.TELEGRAM_RETRY_BACKOFF_SEC, 2, 0, 60) * 1000;
// Longer rate-limit waits fail the send instead of holding the run lock.
export const TELEGRAM_MAX_RETRY_AFTER_MS =
  clampInt(process.env.TELEGRAM_MAX_RETRY_AFTER_SEC, 30, 0, 300) * 1000;

// Injection token for the SQLite file location; tests bind ':memory:'.
export const DELIVERY_DB_PATH_TOKEN = 'DELIVERY_DB_PATH';
// Injection token for the outbound channel used by the coordinator.
export const DELIVERY_CHANNEL_TOKEN = 'DELIVERY_CHANNEL';
// Injection token for the configured feed list.
export const FEED_SOURCES_TOKEN = 'FEED_SOURCES';
export const DEDUPE_BY_LINK_TOKEN = 'DEDUPE_BY_LINK';
