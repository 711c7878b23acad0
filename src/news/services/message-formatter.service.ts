import { Injectable } from '@nestjs/common';
import {
  ELLIPSIS,
  MESSAGE_MAX_CHARS,
  SUMMARY_MAX_CHARS,
} from '../config/news.constants';
import { Candidate } from '../types/news.types';
import { formatUtcStamp } from '../utils/date.util';
import { escapeHtml, toHashtag, truncateText } from '../utils/text.util';

export type FormattableCandidate = Pick<
  Candidate,
  'title' | 'body' | 'link' | 'sourceName' | 'publishedAt' | 'tags'
>;

export interface FormatOptions {
  maxChars?: number;
  summaryMaxChars?: number;
}

interface FrameLayout {
  withDate: boolean;
  withHashtags: boolean;
}

// Tried in order until the frame without a body fits the ceiling.
const LAYOUTS: FrameLayout[] = [
  { withDate: true, withHashtags: true },
  { withDate: true, withHashtags: false },
  { withDate: false, withHashtags: false },
];

export class MessageTooLongError extends Error {
  constructor(length: number, maxChars: number) {
    super(`message too long: frame=${length} max=${maxChars}`);
    this.name = 'MessageTooLongError';
  }
}

/**
 * Renders a candidate in the Telegram HTML subset (<b>, <i>, <a>). The body
 * shrinks first, then the hashtags and date lines are dropped. Throws
 * MessageTooLongError when title, link and source alone exceed the ceiling.
 */
@Injectable()
export class MessageFormatterService {
  format(candidate: FormattableCandidate, options?: FormatOptions): string {
    const maxChars = options?.maxChars ?? MESSAGE_MAX_CHARS;
    const summaryMaxChars = options?.summaryMaxChars ?? SUMMARY_MAX_CHARS;

    let frameLength = 0;
    for (const layout of LAYOUTS) {
      const frame = this.compose(candidate, '', layout);
      frameLength = frame.length;
      if (frameLength <= maxChars) {
        return this.fillBody(candidate, layout, frame, {
          maxChars,
          summaryMaxChars,
        });
      }
    }
    throw new MessageTooLongError(frameLength, maxChars);
  }

  buildHashtags(tags: string[]): string {
    const unique = new Set(
      tags.map((tag) => toHashtag(tag)).filter((tag) => tag.length > 0),
    );
    return [...unique].join(' ');
  }

  private fillBody(
    candidate: FormattableCandidate,
    layout: FrameLayout,
    frame: string,
    limits: Required<FormatOptions>,
  ): string {
    let budget = Math.min(
      limits.summaryMaxChars,
      limits.maxChars - frame.length - 2,
    );
    while (budget > ELLIPSIS.length) {
      const body = escapeHtml(
        truncateText(candidate.body, budget - ELLIPSIS.length),
      );
      const message = this.compose(candidate, body, layout);
      if (message.length <= limits.maxChars) {
        return message;
      }
      budget -= message.length - limits.maxChars;
    }
    return frame;
  }

  private compose(
    candidate: FormattableCandidate,
    body: string,
    layout: FrameLayout,
  ): string {
    const lines = [`📰 <b>${escapeHtml(candidate.title)}</b>`, ''];
    if (body) {
      lines.push(body, '');
    }
    lines.push(`📖 <a href="${escapeHtml(candidate.link)}">Read more</a>`);
    lines.push(`<i>Source: ${escapeHtml(candidate.sourceName)}</i>`);
    const stamp = layout.withDate ? formatUtcStamp(candidate.publishedAt) : '';
    if (stamp) {
      lines.push(`<i>${stamp}</i>`);
    }
    const hashtags = layout.withHashtags
      ? this.buildHashtags(candidate.tags)
      : '';
    if (hashtags) {
      lines.push('', hashtags);
    }
    return lines.join('\n');
  }
}
