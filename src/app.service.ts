import { Injectable } from '@nestjs/common';
import { SERVICE_NAME } from './news/config/news.constants';
import { FEED_SOURCES } from './news/config/feed-sources';

@Injectable()
export class AppService {
  getInfo(): { service: string; version: string; sources: string[] } {
    return {
      service: SERVICE_NAME,
      version: '1.0.0',
      sources: FEED_SOURCES.map((source) => source.name),
    };
  }
}
