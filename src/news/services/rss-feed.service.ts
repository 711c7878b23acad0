import { Injectable, Logger } from '@nestjs/common';
import {
  ENTRIES_PER_SOURCE,
  FEED_FETCH_TIMEOUT_MS,
  FEED_USER_AGENT,
} from '../config/news.constants';
import { FeedSource, RawEntry, SourceFeed } from '../types/news.types';
import { parseDateToIso } from '../utils/date.util';
import { sortByPublishedDesc } from '../utils/ordering.util';
import { normalizeText } from '../utils/text.util';

const FEED_ROOT_RE = /<(rss|feed|rdf:RDF)\b/i;

@Injectable()
export class RssFeedService {
  private readonly logger = new Logger(RssFeedService.name);

  async fetch(source: FeedSource): Promise<RawEntry[]> {
    const result = await this.fetchOnce(source);
    return result.entries;
  }

  async fetchAll(sources: FeedSource[]): Promise<SourceFeed[]> {
    const startedAt = Date.now();
    const feeds = await Promise.all(
      sources.map(async (source, sourceIndex) => ({
        source,
        sourceIndex,
        ...(await this.fetchOnce(source)),
      })),
    );
    const failed = feeds.filter((feed) => feed.failed).length;
    this.logger.log(
      `rss fetch all done: sources=${sources.length} failed=${failed} entries=${feeds.reduce((sum, feed) => sum + feed.entries.length, 0)} elapsedMs=${Date.now() - startedAt}`,
    );
    return feeds;
  }

  resolveLimit(source: FeedSource): number {
    const raw = source.limit ?? ENTRIES_PER_SOURCE;
    if (!Number.isFinite(raw) || raw <= 0) {
      return ENTRIES_PER_SOURCE;
    }
    return Math.floor(raw);
  }

  private async fetchOnce(
    source: FeedSource,
  ): Promise<{ entries: RawEntry[]; failed: boolean }> {
    const startedAt = Date.now();
    const limit = this.resolveLimit(source);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), FEED_FETCH_TIMEOUT_MS);
    try {
      const res = await fetch(source.url, {
        headers: {
          'User-Agent': FEED_USER_AGENT,
          Accept:
            'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8',
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        this.logger.warn(
          `rss fetch failed: ${res.status} ${this.describeSource(source)}`,
        );
        return { entries: [], failed: true };
      }

      const xml = await res.text();
      if (!FEED_ROOT_RE.test(xml)) {
        this.logger.warn(`rss malformed feed: ${this.describeSource(source)}`);
        return { entries: [], failed: true };
      }

      const entries = sortByPublishedDesc(this.parseFeed(xml, source)).slice(
        0,
        limit,
      );
      this.logger.log(
        `rss fetch done: items=${entries.length} elapsedMs=${Date.now() - startedAt} ${this.describeSource(source)}`,
      );
      return { entries, failed: false };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `rss fetch error: ${this.describeSource(source)} ${message}`,
      );
      return { entries: [], failed: true };
    } finally {
      clearTimeout(timeout);
    }
  }

  private parseFeed(xml: string, source: FeedSource): RawEntry[] {
    const channelTitle = normalizeText(this.extractTag(xml, 'title'));
    const sourceName =
      source.name || channelTitle || this.describeSource(source);
    const rssItems: string[] = xml.match(/<item\b[\s\S]*?<\/item>/gi) ?? [];
    const blocks =
      rssItems.length > 0
        ? rssItems
        : (xml.match(/<entry\b[\s\S]*?<\/entry>/gi) ?? []);

    return blocks
      .map((block: string, order: number): RawEntry => {
        const summary =
          this.extractTag(block, 'description') ||
          this.extractTag(block, 'summary') ||
          this.extractTag(block, 'content:encoded') ||
          this.extractTag(block, 'content');

        return {
          title: normalizeText(this.extractTag(block, 'title')),
          link: this.extractLink(block),
          summary,
          guid: normalizeText(
            this.extractTag(block, 'guid') || this.extractTag(block, 'id'),
          ),
          publishedAt: this.extractPublishedAt(block),
          sourceName,
          order,
        };
      })
      .filter((entry) => entry.title && entry.link);
  }

  private extractLink(block: string): string {
    const text = normalizeText(this.extractTag(block, 'link'));
    if (text) {
      return text;
    }
    const atomLinks = block.match(/<link\b[^>]*>/gi) ?? [];
    let fallback = '';
    for (const tag of atomLinks) {
      const href = tag.match(/\bhref\s*=\s*["']([^"']+)["']/i)?.[1];
      if (!href) {
        continue;
      }
      const rel = tag.match(/\brel\s*=\s*["']([^"']+)["']/i)?.[1];
      if (!rel || rel === 'alternate') {
        return normalizeText(href);
      }
      fallback = fallback || normalizeText(href);
    }
    return fallback;
  }

  private extractPublishedAt(block: string): string | null {
    const tags = ['pubDate', 'published', 'updated', 'dc:date'];
    for (const tag of tags) {
      const iso = parseDateToIso(normalizeText(this.extractTag(block, tag)));
      if (iso) {
        return iso;
      }
    }
    return null;
  }

  private extractTag(xml: string, tagName: string): string {
    const escapedTag = tagName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(
      `<${escapedTag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${escapedTag}>`,
      'i',
    );
    const match = xml.match(regex);
    return match?.[1]?.trim() ?? '';
  }

  private describeSource(source: FeedSource): string {
    try {
      const parsed = new URL(source.url);
      return `source=${source.name} host=${parsed.hostname}`;
    } catch {
      return `source=${source.name} url=${source.url.slice(0, 80)}`;
    }
  }
}
