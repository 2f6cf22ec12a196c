/**
 * Realtime Dispatcher
 *
 * Routes a topic to a live data feed by keyword. The first matching route
 * wins; a topic that matches nothing gets no realtime data.
 */

import type { SearchResult } from '@/types/research';
import {
  fetchAqi,
  fetchCrypto,
  fetchEarthquakes,
  fetchForex,
  fetchGold,
  fetchNews,
  fetchNifty,
  fetchWeather,
  type Feed,
  type FeedContext,
} from '@/services/realtime/feeds';
import { createLogger } from '@/utils/logger';
import { errorMessage } from '@/errors/research';

const log = createLogger('realtime');

export interface RealtimeSource {
  fetch(topic: string): Promise<SearchResult[]>;
}

export interface RealtimeRoute {
  name: string;
  keywords: readonly string[];
  feed: Feed;
}

export const REALTIME_ROUTES: readonly RealtimeRoute[] = [
  { name: 'crypto', keywords: ['btc', 'eth', 'crypto', 'bitcoin', 'ethereum'], feed: fetchCrypto },
  { name: 'stocks', keywords: ['nifty', 'sensex', 'stocks'], feed: fetchNifty },
  { name: 'forex', keywords: ['forex', 'usd', 'inr', 'currency'], feed: fetchForex },
  { name: 'gold', keywords: ['gold', 'xau'], feed: fetchGold },
  { name: 'weather', keywords: ['weather', 'temperature', 'rain', 'climate'], feed: fetchWeather },
  { name: 'aqi', keywords: ['aqi', 'air quality'], feed: fetchAqi },
  { name: 'earthquakes', keywords: ['earthquake', 'seismic'], feed: fetchEarthquakes },
  { name: 'news', keywords: ['news', 'headlines', 'trending'], feed: fetchNews },
];

export function matchRoute(topic: string, routes: readonly RealtimeRoute[] = REALTIME_ROUTES): RealtimeRoute | null {
  const lower = topic.toLowerCase();
  return routes.find((route) => route.keywords.some((keyword) => lower.includes(keyword))) ?? null;
}

export class RealtimeDispatcher implements RealtimeSource {
  constructor(
    private readonly ctx: FeedContext,
    private readonly routes: readonly RealtimeRoute[] = REALTIME_ROUTES,
  ) {}

  async fetch(topic: string): Promise<SearchResult[]> {
    const route = matchRoute(topic, this.routes);
    if (!route) return [];

    try {
      const results = await route.feed(this.ctx);
      log.info('Realtime feed answered', { route: route.name, topic, count: results.length });
      return results;
    } catch (error) {
      log.error('Realtime feed failed', { route: route.name, topic, error: errorMessage(error) });
      return [];
    }
  }
}
