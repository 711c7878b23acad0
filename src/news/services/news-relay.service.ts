import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  ALLOW_LINK_PREVIEW,
  DEDUPE_BY_LINK,
  DEDUPE_BY_LINK_TOKEN,
  DELIVERY_CHANNEL_TOKEN,
  FEED_SOURCES_TOKEN,
  MAX_DELIVERIES_PER_RUN,
  MIN_SCORE,
  RETENTION_DAYS,
  TITLE_MAX_CHARS,
} from '../config/news.constants';
import { FEED_SOURCES } from '../config/feed-sources';
import {
  Candidate,
  DeliveredItem,
  DeliveryChannel,
  FeedSource,
  RunOptions,
  RunResult,
  RunStage,
  RunStats,
  SendResult,
  SourceFeed,
} from '../types/news.types';
import { daysToMs } from '../utils/date.util';
import { rankCandidates, sortByPublishedDesc } from '../utils/ordering.util';
import { SingleFlightLock } from '../utils/single-flight.util';
import { normalizeText, truncateText } from '../utils/text.util';
import { ContentIdentityService } from './content-identity.service';
import { DeliveryHistoryService } from './delivery-history.service';
import {
  MessageFormatterService,
  MessageTooLongError,
} from './message-formatter.service';
import { RelevanceScoringService } from './relevance-scoring.service';
import { RssFeedService } from './rss-feed.service';

const MAX_DELIVERIES_CAP = 3;

@Injectable()
export class NewsRelayService {
  private readonly logger = new Logger(NewsRelayService.name);
  private readonly runLock = new SingleFlightLock();
  private stage: RunStage = 'idle';

  constructor(
    private readonly rssFeedService: RssFeedService,
    private readonly identityService: ContentIdentityService,
    private readonly scoringService: RelevanceScoringService,
    private readonly historyService: DeliveryHistoryService,
    private readonly formatterService: MessageFormatterService,
    @Inject(DELIVERY_CHANNEL_TOKEN)
    private readonly channel: DeliveryChannel,
    @Optional()
    @Inject(FEED_SOURCES_TOKEN)
    private readonly sources: FeedSource[] = FEED_SOURCES,
    @Optional()
    @Inject(DEDUPE_BY_LINK_TOKEN)
    private readonly dedupeByLink: boolean = DEDUPE_BY_LINK,
  ) {}

  getStage(): RunStage {
    return this.stage;
  }

  isRunning(): boolean {
    return this.runLock.busy;
  }

  async run(options?: RunOptions): Promise<RunResult> {
    const stats = this.emptyStats();
    const release = this.runLock.tryAcquire();
    if (!release) {
      this.logger.warn('run skipped: another run is in progress');
      return {
        status: 'skipped',
        delivered: 0,
        skippedReason: 'busy',
        deliveredItems: [],
        stats,
      };
    }

    const startedAt = Date.now();
    const maxDeliveries = this.resolveMaxDeliveries(options?.maxDeliveries);
    const minScore = options?.minScore ?? MIN_SCORE;
    const dryRun = Boolean(options?.dryRun);
    const deliveredItems: DeliveredItem[] = [];

    try {
      this.stage = 'fetching';
      this.logger.log(
        `run start: sources=${this.sources.length} maxDeliveries=${maxDeliveries} minScore=${minScore} dryRun=${dryRun ? 1 : 0}`,
      );
      const feeds = await this.rssFeedService.fetchAll(this.sources);
      stats.sources = feeds.length;
      stats.failedSources = feeds.filter((feed) => feed.failed).length;
      stats.fetched = feeds.reduce((sum, feed) => sum + feed.entries.length, 0);

      this.stage = 'selecting';
      const ranked = this.uniqueByFingerprint(
        rankCandidates(this.buildCandidates(feeds)),
      );
      stats.candidates = ranked.length;

      const eligible: Candidate[] = [];
      for (const candidate of ranked) {
        if (!this.scoringService.isEligible(candidate.score, minScore)) {
          continue;
        }
        if (await this.isAlreadyDelivered(candidate)) {
          stats.alreadyDelivered += 1;
          continue;
        }
        eligible.push(candidate);
      }
      stats.eligible = eligible.length;
      this.logger.log(
        `stage select done: fetched=${stats.fetched} candidates=${stats.candidates} eligible=${stats.eligible} alreadyDelivered=${stats.alreadyDelivered}`,
      );

      const selected = eligible.slice(0, maxDeliveries);
      if (selected.length === 0) {
        this.stage = 'idle';
        return {
          status: 'idle',
          delivered: 0,
          skippedReason: 'no_eligible_candidates',
          deliveredItems,
          stats,
        };
      }

      if (dryRun) {
        this.stage = 'idle';
        return {
          status: 'skipped',
          delivered: 0,
          skippedReason: 'dry_run',
          deliveredItems: selected.map((candidate) =>
            this.summarize(candidate),
          ),
          stats,
        };
      }

      this.stage = 'delivering';
      for (const candidate of selected) {
        const sent = await this.deliver(candidate);
        if (!sent.ok) {
          stats.sendFailures += 1;
          this.logger.warn(
            `send failed, will retry next run: fp=${candidate.fingerprint.slice(0, 12)} ${sent.error}`,
          );
          continue;
        }

        const outcome = await this.recordAfterSend(candidate);
        if (outcome === 'already_exists') {
          this.logger.warn(
            `delivery already recorded by another run: fp=${candidate.fingerprint.slice(0, 12)}`,
          );
        }
        deliveredItems.push(this.summarize(candidate));
        this.logger.log(
          `delivered: score=${candidate.score} source=${candidate.sourceName} title=${candidate.title.slice(0, 50)}`,
        );
      }

      await this.housekeeping();

      this.stage = 'idle';
      this.logger.log(
        `run done: delivered=${deliveredItems.length} sendFailures=${stats.sendFailures} elapsedMs=${Date.now() - startedAt}`,
      );
      if (deliveredItems.length === 0) {
        return {
          status: 'idle',
          delivered: 0,
          skippedReason: 'send_failed',
          deliveredItems,
          stats,
        };
      }
      return {
        status: 'delivered',
        delivered: deliveredItems.length,
        deliveredItems,
        stats,
      };
    } catch (error) {
      this.stage = 'failed';
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`run failed: ${message}`);
      return {
        status: 'failed',
        delivered: deliveredItems.length,
        error: message,
        deliveredItems,
        stats,
      };
    } finally {
      release();
    }
  }

  buildCandidates(feeds: SourceFeed[]): Candidate[] {
    const candidates: Candidate[] = [];
    for (const { source, sourceIndex, entries } of feeds) {
      for (const entry of sortByPublishedDesc(entries)) {
        const { title } = entry;
        const body = normalizeText(entry.summary);
        candidates.push({
          title: truncateText(title, TITLE_MAX_CHARS),
          body,
          link: entry.link,
          sourceName: source.name || entry.sourceName,
          sourceIndex,
          entryIndex: entry.order,
          tags: source.tags,
          fingerprint: this.identityService.fingerprint(title, body),
          score: this.scoringService.score(title, body),
          publishedAt: entry.publishedAt,
        });
      }
    }
    return candidates;
  }

  private uniqueByFingerprint(candidates: Candidate[]): Candidate[] {
    const seen = new Set<string>();
    return candidates.filter((candidate) => {
      if (seen.has(candidate.fingerprint)) {
        return false;
      }
      seen.add(candidate.fingerprint);
      return true;
    });
  }

  private async isAlreadyDelivered(candidate: Candidate): Promise<boolean> {
    if (await this.historyService.exists(candidate.fingerprint)) {
      return true;
    }
    if (!this.dedupeByLink) {
      return false;
    }
    return this.historyService.existsLink(candidate.link);
  }

  private async deliver(candidate: Candidate): Promise<SendResult> {
    let text: string;
    try {
      text = this.formatterService.format(candidate);
    } catch (error) {
      if (error instanceof MessageTooLongError) {
        return { ok: false, error: error.message };
      }
      throw error;
    }
    return this.channel.send(text, { allowLinkPreview: ALLOW_LINK_PREVIEW });
  }

  private async recordAfterSend(
    candidate: Candidate,
  ): Promise<'recorded' | 'already_exists'> {
    try {
      return await this.historyService.record(candidate.fingerprint, {
        title: candidate.title,
        link: candidate.link,
        source: candidate.sourceName,
      });
    } catch (error) {
      this.logger.error(
        `sent but not recorded, may be re-sent: fp=${candidate.fingerprint.slice(0, 12)} link=${candidate.link}`,
      );
      throw error;
    }
  }

  private async housekeeping(): Promise<void> {
    try {
      await this.historyService.purge(daysToMs(RETENTION_DAYS));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`history purge skipped: ${message}`);
    }
  }

  private summarize(candidate: Candidate): DeliveredItem {
    return {
      fingerprint: candidate.fingerprint,
      title: candidate.title,
      link: candidate.link,
      sourceName: candidate.sourceName,
      score: candidate.score,
    };
  }

  private resolveMaxDeliveries(value?: number): number {
    if (value == null || !Number.isFinite(value)) {
      return MAX_DELIVERIES_PER_RUN;
    }
    return Math.max(1, Math.min(MAX_DELIVERIES_CAP, Math.floor(value)));
  }

  private emptyStats(): RunStats {
    return {
      sources: 0,
      failedSources: 0,
      fetched: 0,
      candidates: 0,
      eligible: 0,
      alreadyDelivered: 0,
      sendFailures: 0,
    };
  }
}
