import { Module } from '@nestjs/common';
import {
  DEDUPE_BY_LINK,
  DEDUPE_BY_LINK_TOKEN,
  DELIVERY_CHANNEL_TOKEN,
  DELIVERY_DB_PATH,
  DELIVERY_DB_PATH_TOKEN,
  FEED_SOURCES_TOKEN,
} from './config/news.constants';
import { FEED_SOURCES } from './config/feed-sources';
import { NewsController } from './news.controller';
import { ContentIdentityService } from './services/content-identity.service';
import { DeliveryHistoryService } from './services/delivery-history.service';
import { MessageFormatterService } from './services/message-formatter.service';
import { NewsRelayService } from './services/news-relay.service';
import { RelevanceScoringService } from './services/relevance-scoring.service';
import { RssFeedService } from './services/rss-feed.service';
import { TelegramDeliveryService } from './services/telegram-delivery.service';

@Module({
  controllers: [NewsController],
  providers: [
    { provide: DELIVERY_DB_PATH_TOKEN, useValue: DELIVERY_DB_PATH },
    { provide: FEED_SOURCES_TOKEN, useValue: FEED_SOURCES },
    { provide: DEDUPE_BY_LINK_TOKEN, useValue: DEDUPE_BY_LINK },
    TelegramDeliveryService,
    { provide: DELIVERY_CHANNEL_TOKEN, useExisting: TelegramDeliveryService },
    RssFeedService,
    ContentIdentityService,
    RelevanceScoringService,
    DeliveryHistoryService,
    MessageFormatterService,
    NewsRelayService,
  ],
  exports: [NewsRelayService, DeliveryHistoryService, TelegramDeliveryService],
})
export class NewsModule {}
