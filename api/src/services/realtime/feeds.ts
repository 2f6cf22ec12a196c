/**
 * Live data feeds used by the realtime dispatcher. Each feed resolves to
 * SearchResult-shaped items and to [] when its upstream is unavailable.
 */

import Parser from 'rss-parser';
import type { SearchResult } from '@/types/research';
import { fetchJson, fetchText, type QueryParams } from '@/utils/http';
import { createLogger } from '@/utils/logger';
import { errorMessage } from '@/errors/research';

const log = createLogger('realtime-feeds');

export interface FeedContext {
  timeoutMs: number;
  openWeatherApiKey?: string;
  weatherCity: string;
  fetchFn?: typeof globalThis.fetch;
}

export type Feed = (ctx: FeedContext) => Promise<SearchResult[]>;

async function safeGet<T>(ctx: FeedContext, url: string, query?: QueryParams): Promise<T | null> {
  try {
    return await fetchJson<T>(url, { query, timeoutMs: ctx.timeoutMs, fetchFn: ctx.fetchFn });
  } catch (error) {
    log.error('Feed fetch failed', { url, error: errorMessage(error) });
    return null;
  }
}

const BINANCE_TICKER = 'https://api.binance.com/api/v3/ticker/price';

export const fetchCrypto: Feed = async (ctx) => {
  const pairs = [
    { symbol: 'BTCUSDT', title: 'Live Bitcoin (BTC) Price', label: 'BTC/USDT' },
    { symbol: 'ETHUSDT', title: 'Live Ethereum (ETH) Price', label: 'ETH/USDT' },
  ];

  const out: SearchResult[] = [];
  for (const pair of pairs) {
    const ticker = await safeGet<{ price?: string }>(ctx, BINANCE_TICKER, { symbol: pair.symbol });
    if (!ticker?.price) continue;
    out.push({
      title: pair.title,
      url: `${BINANCE_TICKER}?symbol=${pair.symbol}`,
      snippet: `${pair.label}: ${ticker.price}`,
      provider: 'binance',
    });
  }
  return out;
};

interface PriceHistory {
  c?: number[];
}

export const fetchNifty: Feed = async (ctx) => {
  const history = await safeGet<PriceHistory>(
    ctx,
    'https://priceapi.moneycontrol.com/techCharts/indianMarket/stock/history',
    { symbol: 'NIFTY 50', resolution: '1' },
  );
  const closes = history?.c ?? [];
  if (closes.length === 0) return [];
  return [
    {
      title: 'Live Nifty 50 Index',
      url: 'https://www.nseindia.com',
      snippet: `Nifty50 latest price: ${closes[closes.length - 1]}`,
      provider: 'moneycontrol',
    },
  ];
};

export const fetchForex: Feed = async (ctx) => {
  const fx = await safeGet<{ rates?: Record<string, number> }>(ctx, 'https://open.er-api.com/v6/latest/USD');
  const rate = fx?.rates?.INR;
  if (rate === undefined) return [];
  return [
    {
      title: 'USD/INR Forex Rate',
      url: 'https://open.er-api.com/v6/latest/USD',
      snippet: `USD -> INR: ${rate}`,
      provider: 'exchangerate-api',
    },
  ];
};

export const fetchGold: Feed = async (ctx) => {
  const gold = await safeGet<Array<{ price?: number }>>(ctx, 'https://api.metals.live/v1/spot/gold');
  const price = Array.isArray(gold) ? gold[0]?.price : undefined;
  if (price === undefined) return [];
  return [
    {
      title: 'Live Gold Price (XAU/USD)',
      url: 'https://metals.live',
      snippet: `Gold Spot Price (USD): ${price}`,
      provider: 'metals.live',
    },
  ];
};

interface OpenWeatherResponse {
  id?: number;
  main?: { temp?: number; feels_like?: number; humidity?: number };
  weather?: Array<{ description?: string }>;
}

export const fetchWeather: Feed = async (ctx) => {
  if (!ctx.openWeatherApiKey) {
    log.warn('OPENWEATHER_API_KEY missing; weather feed disabled');
    return [];
  }

  const data = await safeGet<OpenWeatherResponse>(ctx, 'https://api.openweathermap.org/data/2.5/weather', {
    q: ctx.weatherCity,
    appid: ctx.openWeatherApiKey,
    units: 'metric',
  });
  if (!data?.main || data.id === undefined) return [];

  const description = data.weather?.[0]?.description ?? 'Current conditions';
  return [
    {
      title: `Weather in ${ctx.weatherCity}`,
      url: `https://openweathermap.org/city/${data.id}`,
      snippet: `${description}. Temp: ${data.main.temp}°C, Feels like: ${data.main.feels_like}°C, Humidity: ${data.main.humidity}%`,
      provider: 'openweather',
    },
  ];
};

export const fetchAqi: Feed = async (ctx) => {
  const aqi = await safeGet<{ status?: string; data?: { aqi?: number } }>(
    ctx,
    `https://api.waqi.info/feed/${encodeURIComponent(ctx.weatherCity)}/`,
    { token: 'demo' },
  );
  if (aqi?.status !== 'ok' || aqi.data?.aqi === undefined) return [];
  return [
    {
      title: `Live AQI (${ctx.weatherCity})`,
      url: 'https://waqi.info',
      snippet: `AQI: ${aqi.data.aqi}`,
      provider: 'waqi',
    },
  ];
};

interface UsgsFeed {
  features?: Array<{ properties?: { mag?: number; place?: string; url?: string } }>;
}

export const fetchEarthquakes: Feed = async (ctx) => {
  const feed = await safeGet<UsgsFeed>(
    ctx,
    'https://earthquake.usgs.gov/earthquakes/feed/v1.0/summary/all_hour.geojson',
  );

  const out: SearchResult[] = [];
  for (const feature of (feed?.features ?? []).slice(0, 5)) {
    const props = feature.properties;
    if (!props?.url) continue;
    out.push({
      title: `Earthquake M${props.mag ?? '?'}`,
      url: props.url,
      snippet: `Magnitude ${props.mag ?? '?'} near ${props.place ?? 'unknown location'}`,
      provider: 'usgs',
    });
  }
  return out;
};

const GOOGLE_NEWS_RSS = 'https://news.google.com/rss';
const MAX_NEWS_ITEMS = 5;
const rssParser = new Parser<object, object>();

export const fetchNews: Feed = async (ctx) => {
  let xml: string;
  try {
    xml = await fetchText(GOOGLE_NEWS_RSS, {
      query: { hl: 'en-IN', gl: 'IN', ceid: 'IN:en' },
      timeoutMs: ctx.timeoutMs,
      fetchFn: ctx.fetchFn,
    });
  } catch (error) {
    log.error('Feed fetch failed', { url: GOOGLE_NEWS_RSS, error: errorMessage(error) });
    return [];
  }

  const feed = await rssParser.parseString(xml);
  return feed.items.slice(0, MAX_NEWS_ITEMS).map((item) => ({
    title: item.title ?? 'Untitled',
    url: item.link ?? '',
    snippet: (item.contentSnippet ?? item.content ?? '').slice(0, 200),
    provider: 'google-news',
  }));
};
