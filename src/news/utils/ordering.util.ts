import { Candidate, RawEntry } from '../types/news.types';
import { toEpochMs } from './date.util';

function comparePublishedDesc(a: string | null, b: string | null): number {
  const left = toEpochMs(a);
  const right = toEpochMs(b);
  if (left == null && right == null) {
    return 0;
  }
  // entries without a parseable timestamp sort as oldest
  if (left == null) {
    return 1;
  }
  if (right == null) {
    return -1;
  }
  return right - left;
}

export function sortByPublishedDesc(entries: RawEntry[]): RawEntry[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort(
      (a, b) =>
        comparePublishedDesc(a.entry.publishedAt, b.entry.publishedAt) ||
        a.entry.order - b.entry.order ||
        a.index - b.index,
    )
    .map(({ entry }) => entry);
}

export function rankCandidates(candidates: Candidate[]): Candidate[] {
  return [...candidates].sort(
    (a, b) =>
      b.score - a.score ||
      comparePublishedDesc(a.publishedAt, b.publishedAt) ||
      a.sourceIndex - b.sourceIndex ||
      a.entryIndex - b.entryIndex,
  );
}
