// lib/dashboard.ts

import { clampWindow, defaultWindow, queryPrices, seriesBounds } from './aggregator';
import { MemoizedCache, createCacheStore } from './cache';
import { COMMODITIES, type Commodity } from './commodities';
import { loadConfig, type DashboardConfig } from './config';
import { DataFormatError } from './errors';
import { RAINFALL_PERIODS, fetchRainfall } from './imd';
import type { PriceQuery } from './params';
import type {
  DateBounds,
  DateWindow,
  PriceQueryResult,
  PriceSeries,
  RainfallPeriod,
  RainfallRecord,
} from './types';
import { loadPriceSeries } from './workbook';

const PRICE_SERIES_KEY = 'price-series';

export type Overview = {
  commodities: Commodity[];
  defaultSelection: Commodity[];
  bounds: DateBounds;
  defaultWindow: DateWindow;
};

export type PriceQueryResponse = PriceQueryResult & {
  window: DateWindow;
  bounds: DateBounds;
};

export type RefreshSummary = {
  priceRecords: number;
  bounds: DateBounds;
  rainfall: Array<{ period: RainfallPeriod; states: number }>;
};

export type DashboardDeps = {
  config: DashboardConfig;
  cache: MemoizedCache;
  loadSeries?: (config: DashboardConfig) => Promise<PriceSeries>;
  fetchImpl?: typeof fetch;
};

export type DashboardService = ReturnType<typeof createDashboardService>;

export function rainfallKey(period: RainfallPeriod): string {
  return `rainfall:${period}`;
}

function loadFromWorkbook(config: DashboardConfig): Promise<PriceSeries> {
  return loadPriceSeries(config.workbookPath, {
    layout: { sheetName: config.sheetName },
    missingPrices: config.missingPrices,
  });
}

export function createDashboardService(deps: DashboardDeps) {
  const { config, cache } = deps;
  const loadSeries = deps.loadSeries ?? loadFromWorkbook;

  async function getPriceSeries(): Promise<PriceSeries> {
    return cache.getOrCompute(PRICE_SERIES_KEY, config.cacheTtlSeconds, async () => {
      const startTime = Date.now();
      const series = await loadSeries(config);
      console.log(`Price series loaded: ${series.length} records (${Date.now() - startTime}ms)`);
      return series;
    });
  }

  async function getBounds(): Promise<{ series: PriceSeries; bounds: DateBounds }> {
    const series = await getPriceSeries();
    const bounds = seriesBounds(series);
    if (!bounds) {
      throw new DataFormatError('Workbook produced no weekly prices');
    }
    return { series, bounds };
  }

  async function getOverview(): Promise<Overview> {
    const { series, bounds } = await getBounds();
    const present = new Set(series.map((r) => r.commodity));
    const commodities = COMMODITIES.filter((c) => present.has(c));
    return {
      commodities,
      defaultSelection: commodities.slice(0, 1),
      bounds,
      defaultWindow: defaultWindow(bounds),
    };
  }

  async function query(q: PriceQuery): Promise<PriceQueryResponse> {
    const { series, bounds } = await getBounds();
    const fallback = defaultWindow(bounds);
    const window = clampWindow({ start: q.start ?? fallback.start, end: q.end ?? fallback.end }, bounds);
    return {
      ...queryPrices(series, q.commodities, window, q.normalize),
      window,
      bounds,
    };
  }

  async function getRainfall(period: RainfallPeriod): Promise<RainfallRecord[]> {
    return cache.getOrCompute(rainfallKey(period), config.cacheTtlSeconds, () =>
      fetchRainfall(period, {
        url: config.rainfallUrl,
        marker: config.rainfallMarker,
        timeoutMs: config.rainfallTimeoutMs,
        fetchImpl: deps.fetchImpl,
      })
    );
  }

  // キャッシュを捨てて読み直す
  async function refreshPrices(): Promise<{ records: number; bounds: DateBounds }> {
    await cache.invalidate(PRICE_SERIES_KEY);
    const { series, bounds } = await getBounds();
    return { records: series.length, bounds };
  }

  async function refreshRainfall(period: RainfallPeriod): Promise<number> {
    await cache.invalidate(rainfallKey(period));
    return (await getRainfall(period)).length;
  }

  async function refreshAll(): Promise<RefreshSummary> {
    const prices = await refreshPrices();
    const rainfall: RefreshSummary['rainfall'] = [];
    for (const period of RAINFALL_PERIODS) {
      rainfall.push({ period, states: await refreshRainfall(period) });
    }
    return { priceRecords: prices.records, bounds: prices.bounds, rainfall };
  }

  return {
    getPriceSeries,
    getOverview,
    query,
    getRainfall,
    refreshPrices,
    refreshRainfall,
    refreshAll,
  };
}

let instance: DashboardService | null = null;

// ルートハンドラ用のプロセス内インスタンス
export function getDashboardService(): DashboardService {
  if (!instance) {
    const config = loadConfig();
    instance = createDashboardService({
      config,
      cache: new MemoizedCache(createCacheStore(config.redisUrl)),
    });
  }
  return instance;
}
