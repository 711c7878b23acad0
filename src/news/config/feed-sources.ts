import { FeedSource } from '../types/news.types';

// Hashtags are attached per source so the formatter never branches on titles.
export const FEED_SOURCES: FeedSource[] = [
  {
    name: 'Habr',
    url: 'https://habr.com/ru/rss/hubs/all/',
    tags: ['ITNews', 'Programming', 'Habr'],
  },
  {
    name: 'OpenNet',
    url: 'https://www.opennet.ru/opennews/opennews_all.rss',
    tags: ['ITNews', 'OpenSource', 'Linux'],
  },
  {
    name: 'Hacker News',
    url: 'https://hnrss.org/frontpage',
    tags: ['ITNews', 'HackerNews'],
    limit: 10,
  },
  {
    name: 'LWN.net',
    url: 'https://lwn.net/headlines/rss',
    tags: ['Linux', 'Kernel', 'OpenSource'],
  },
  {
    name: 'GitHub Blog',
    url: 'https://github.blog/feed/',
    tags: ['GitHub', 'DevTools'],
    limit: 3,
  },
];
