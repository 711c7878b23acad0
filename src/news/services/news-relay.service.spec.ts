import { Logger } from '@nestjs/common';
import {
  DeliveryChannel,
  FeedSource,
  RawEntry,
  SourceFeed,
} from '../types/news.types';
import { ContentIdentityService } from './content-identity.service';
import {
  DeliveryHistoryService,
  DeliveryStoreError,
} from './delivery-history.service';
import { MessageFormatterService } from './message-formatter.service';
import { NewsRelayService } from './news-relay.service';
import { RelevanceScoringService } from './relevance-scoring.service';

const SOURCE_A: FeedSource = {
  name: 'A',
  url: 'https://a.example.com/rss',
  tags: ['ITNews'],
};
const SOURCE_B: FeedSource = {
  name: 'B',
  url: 'https://b.example.com/rss',
  tags: ['OpenSource'],
};

const COMPILER_BODY =
  'The rust team shipped a faster compiler. Source on github.com/example/compiler.';

const buildEntry = (overrides: Partial<RawEntry>): RawEntry => ({
  title: 'New compiler released',
  link: 'https://a.example.com/compiler',
  summary: COMPILER_BODY,
  guid: '',
  publishedAt: '2024-10-14T10:00:00.000Z',
  sourceName: 'A',
  order: 0,
  ...overrides,
});

const feedOf = (
  source: FeedSource,
  sourceIndex: number,
  entries: RawEntry[],
  failed = false,
): SourceFeed => ({ source, sourceIndex, entries, failed });

describe('NewsRelayService', () => {
  let identity: ContentIdentityService;
  let history: DeliveryHistoryService;
  let channel: { send: jest.Mock };
  let rssFeedService: { fetchAll: jest.Mock };

  const createService = (overrides?: {
    history?: unknown;
    channel?: DeliveryChannel;
    dedupeByLink?: boolean;
  }): NewsRelayService =>
    new NewsRelayService(
      rssFeedService as never,
      identity,
      new RelevanceScoringService(),
      (overrides?.history ?? history) as never,
      new MessageFormatterService(),
      overrides?.channel ?? (channel as never),
      [SOURCE_A, SOURCE_B],
      overrides?.dedupeByLink ?? false,
    );

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    identity = new ContentIdentityService();
    history = new DeliveryHistoryService(':memory:');
    channel = { send: jest.fn().mockResolvedValue({ ok: true }) };
    rssFeedService = { fetchAll: jest.fn() };
  });

  afterEach(() => {
    history.close();
    jest.restoreAllMocks();
  });

  it('delivers a relevant entry once and skips it on the next run', async () => {
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [buildEntry({})]),
      feedOf(SOURCE_B, 1, []),
    ]);
    const service = createService();

    const first = await service.run();

    expect(first.status).toBe('delivered');
    expect(first.delivered).toBe(1);
    expect(first.deliveredItems[0]).toMatchObject({
      title: 'New compiler released',
      sourceName: 'A',
      score: 5,
    });
    expect(channel.send).toHaveBeenCalledTimes(1);
    const [text, sendOptions] = channel.send.mock.calls[0];
    expect(text).toContain('📰 <b>New compiler released</b>');
    expect(text).toContain('#ITNews');
    expect(sendOptions).toEqual({ allowLinkPreview: true });
    await expect(
      history.exists(identity.fingerprint('New compiler released', COMPILER_BODY)),
    ).resolves.toBe(true);

    const second = await service.run();

    expect(second).toMatchObject({
      status: 'idle',
      delivered: 0,
      skippedReason: 'no_eligible_candidates',
    });
    expect(second.stats.alreadyDelivered).toBe(1);
    expect(channel.send).toHaveBeenCalledTimes(1);
    expect(service.getStage()).toBe('idle');
  });

  it('uses entries from healthy sources when another source fails', async () => {
    const entries = Array.from({ length: 5 }, (_, i) =>
      buildEntry({
        title: `Rust compiler release ${i}`,
        link: `https://b.example.com/${i}`,
        summary: `Notes ${i}`,
        sourceName: 'B',
        order: i,
      }),
    );
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [], true),
      feedOf(SOURCE_B, 1, entries),
    ]);

    const result = await createService().run({ maxDeliveries: 3 });

    expect(result.status).toBe('delivered');
    expect(result.delivered).toBe(3);
    expect(result.stats).toMatchObject({
      sources: 2,
      failedSources: 1,
      fetched: 5,
      candidates: 5,
      eligible: 5,
    });
    expect(
      result.deliveredItems.every((item) => item.sourceName === 'B'),
    ).toBe(true);
  });

  it('treats a score equal to the threshold as eligible', async () => {
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [
        buildEntry({ title: 'kotlin docker', summary: '', order: 0 }),
        buildEntry({
          title: 'kotlin docker postgres',
          summary: '',
          link: 'https://a.example.com/2',
          order: 1,
        }),
      ]),
    ]);

    const result = await createService().run({ maxDeliveries: 3, minScore: 3 });

    expect(result.stats.eligible).toBe(1);
    expect(result.deliveredItems.map((item) => item.title)).toEqual([
      'kotlin docker postgres',
    ]);
  });

  it('picks the highest score, then the newest entry', async () => {
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [
        buildEntry({
          title: 'kotlin docker postgres older',
          summary: '',
          publishedAt: '2024-10-01T00:00:00.000Z',
          order: 0,
        }),
        buildEntry({
          title: 'kotlin docker postgres newer',
          summary: '',
          publishedAt: '2024-10-02T00:00:00.000Z',
          order: 1,
        }),
      ]),
      feedOf(SOURCE_B, 1, [
        buildEntry({
          title: 'kotlin docker postgres linux',
          summary: '',
          publishedAt: '2024-09-01T00:00:00.000Z',
          sourceName: 'B',
        }),
      ]),
    ]);
    const service = createService();

    const first = await service.run({ maxDeliveries: 1 });
    const second = await service.run({ maxDeliveries: 1 });

    expect(first.deliveredItems[0].title).toBe('kotlin docker postgres linux');
    expect(second.deliveredItems[0].title).toBe('kotlin docker postgres newer');
  });

  it('leaves a candidate unrecorded when the send fails', async () => {
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [buildEntry({})]),
    ]);
    channel.send
      .mockResolvedValueOnce({ ok: false, error: 'telegram 502: Bad Gateway' })
      .mockResolvedValueOnce({ ok: true });
    const service = createService();

    const failedRun = await service.run();

    expect(failedRun).toMatchObject({
      status: 'idle',
      delivered: 0,
      skippedReason: 'send_failed',
    });
    expect(failedRun.stats.sendFailures).toBe(1);
    await expect(history.count()).resolves.toBe(0);

    const retryRun = await service.run();

    expect(retryRun.status).toBe('delivered');
    await expect(history.count()).resolves.toBe(1);
  });

  it('fails the run without sending when the store is unavailable', async () => {
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [buildEntry({})]),
    ]);
    const brokenHistory = {
      exists: jest
        .fn()
        .mockRejectedValue(
          new DeliveryStoreError('exists', new Error('disk I/O error')),
        ),
    };
    const service = createService({ history: brokenHistory });

    const result = await service.run();

    expect(result).toMatchObject({
      status: 'failed',
      delivered: 0,
      error: 'delivery store exists failed: disk I/O error',
    });
    expect(channel.send).not.toHaveBeenCalled();
    expect(service.getStage()).toBe('failed');
  });

  it('does not claim a delivery it could not record', async () => {
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [buildEntry({})]),
    ]);
    const brokenHistory = {
      exists: jest.fn().mockResolvedValue(false),
      record: jest
        .fn()
        .mockRejectedValue(
          new DeliveryStoreError('record', new Error('database is locked')),
        ),
      purge: jest.fn(),
    };
    const service = createService({ history: brokenHistory });

    const result = await service.run();

    expect(result.status).toBe('failed');
    expect(result.delivered).toBe(0);
    expect(result.deliveredItems).toEqual([]);
    expect(channel.send).toHaveBeenCalledTimes(1);
    expect(brokenHistory.purge).not.toHaveBeenCalled();
  });

  it('rejects a concurrent run without touching the store', async () => {
    let resolveFetch: (feeds: SourceFeed[]) => void = () => undefined;
    rssFeedService.fetchAll.mockReturnValueOnce(
      new Promise<SourceFeed[]>((resolve) => {
        resolveFetch = resolve;
      }),
    );
    const existsSpy = jest.spyOn(history, 'exists');
    const service = createService();

    const firstRun = service.run();
    expect(service.isRunning()).toBe(true);
    expect(service.getStage()).toBe('fetching');

    const busy = await service.run();

    expect(busy).toMatchObject({
      status: 'skipped',
      delivered: 0,
      skippedReason: 'busy',
    });
    expect(rssFeedService.fetchAll).toHaveBeenCalledTimes(1);
    expect(existsSpy).not.toHaveBeenCalled();

    resolveFetch([feedOf(SOURCE_A, 0, [buildEntry({})])]);
    await expect(firstRun).resolves.toMatchObject({ status: 'delivered' });
    expect(service.isRunning()).toBe(false);
  });

  it('releases the lock after a failed run', async () => {
    rssFeedService.fetchAll
      .mockRejectedValueOnce(new Error('unexpected'))
      .mockResolvedValueOnce([feedOf(SOURCE_A, 0, [buildEntry({})])]);
    const service = createService();

    const failed = await service.run();
    const next = await service.run();

    expect(failed).toMatchObject({ status: 'failed', error: 'unexpected' });
    expect(next.status).toBe('delivered');
  });

  it('collapses identical content republished by two sources', async () => {
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [buildEntry({})]),
      feedOf(SOURCE_B, 1, [
        buildEntry({
          link: 'https://mirror.example.com/compiler',
          summary: `<p>${COMPILER_BODY}</p>`,
          sourceName: 'B',
        }),
      ]),
    ]);

    const result = await createService().run({ maxDeliveries: 3 });

    expect(result.stats.candidates).toBe(1);
    expect(result.delivered).toBe(1);
    expect(result.deliveredItems[0].sourceName).toBe('A');
  });

  it('selects without sending or recording on a dry run', async () => {
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [buildEntry({})]),
    ]);

    const result = await createService().run({ dryRun: true });

    expect(result).toMatchObject({
      status: 'skipped',
      delivered: 0,
      skippedReason: 'dry_run',
    });
    expect(result.deliveredItems).toHaveLength(1);
    expect(channel.send).not.toHaveBeenCalled();
    await expect(history.count()).resolves.toBe(0);
  });

  it('skips a link already delivered when link dedup is on', async () => {
    await history.record('fp-earlier-copy', {
      title: 'Older wording',
      link: 'https://a.example.com/compiler',
      source: 'A',
    });
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [buildEntry({})]),
    ]);

    const result = await createService({ dedupeByLink: true }).run();

    expect(result).toMatchObject({
      status: 'idle',
      delivered: 0,
      skippedReason: 'no_eligible_candidates',
    });
    expect(result.stats.alreadyDelivered).toBe(1);
    expect(channel.send).not.toHaveBeenCalled();
  });

  it('counts a message that cannot fit the ceiling as a send failure', async () => {
    rssFeedService.fetchAll.mockResolvedValue([
      feedOf(SOURCE_A, 0, [
        buildEntry({ link: `https://a.example.com/${'a'.repeat(5000)}` }),
      ]),
    ]);

    const result = await createService().run();

    expect(result).toMatchObject({
      status: 'idle',
      delivered: 0,
      skippedReason: 'send_failed',
    });
    expect(result.stats.sendFailures).toBe(1);
    expect(channel.send).not.toHaveBeenCalled();
    await expect(history.count()).resolves.toBe(0);
  });

  it('keeps a fetched title as is when building candidates', () => {
    const [candidate] = createService().buildCandidates([
      feedOf(SOURCE_A, 0, [
        buildEntry({ title: 'Why <blink> died', summary: '' }),
      ]),
    ]);

    expect(candidate.title).toBe('Why <blink> died');
    expect(candidate.fingerprint).toBe(
      identity.fingerprint('Why <blink> died', ''),
    );
  });
});
