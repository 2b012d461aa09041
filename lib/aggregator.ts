// lib/aggregator.ts

import { addMonths, formatDayMonthYear } from './dates';
import type {
  DateBounds,
  DateWindow,
  IsoDate,
  PctChangeColumn,
  PctChangeRow,
  PctChangeSlot,
  PriceQueryResult,
  PriceRecord,
  PriceSeries,
} from './types';

const SLOTS: Array<{ id: PctChangeSlot; label: string }> = [
  { id: 'threeWeeksAgo', label: 'Three weeks ago' },
  { id: 'twoWeeksAgo', label: 'Two weeks ago' },
  { id: 'previousWeek', label: 'Previous week' },
  { id: 'latestWeek', label: 'Latest week' },
];

// 直近 5 点から 4 つの前週比を出す
const TRAILING_POINTS = SLOTS.length + 1;

export type QueryOptions = {
  decimals?: number;
};

function emptyResult(): PriceQueryResult {
  return { series: [], pctChange: [], columns: [], misaligned: false };
}

function round(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

function groupByCommodity(series: PriceSeries): Map<string, PriceRecord[]> {
  const groups = new Map<string, PriceRecord[]>();
  for (const r of series) {
    const g = groups.get(r.commodity);
    if (g) g.push(r);
    else groups.set(r.commodity, [r]);
  }
  for (const g of groups.values()) {
    g.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }
  return groups;
}

// 品目ごとに窓の最初の価格を 100 とする
export function rebase(series: PriceSeries): PriceSeries {
  const base = new Map<string, number>();
  for (const g of groupByCommodity(series).values()) {
    base.set(g[0].commodity, g[0].price);
  }
  return series.map((r) => {
    const first = base.get(r.commodity) ?? r.price;
    return { ...r, price: (r.price / first) * 100 };
  });
}

export function percentChanges(prices: number[]): Array<number | null> {
  return prices.slice(1).map((p, i) => {
    const prev = prices[i];
    const change = ((p - prev) / prev) * 100;
    return Number.isFinite(change) ? change : null;
  });
}

function buildRow(points: PriceRecord[], decimals: number): PctChangeRow | null {
  const tail = points.slice(-TRAILING_POINTS);
  const changes = percentChanges(tail.map((p) => p.price));
  if (changes.every((c) => c === null)) return null;

  // 履歴が足りない場合は新しい側から埋める
  const offset = SLOTS.length - changes.length;
  const values: Array<number | null> = SLOTS.map(() => null);
  const dates: Array<IsoDate | null> = SLOTS.map(() => null);
  changes.forEach((c, j) => {
    values[offset + j] = c === null ? null : round(c, decimals);
    dates[offset + j] = tail[j + 1].date;
  });

  return {
    commodity: points[0].commodity,
    threeWeeksAgo: values[0],
    twoWeeksAgo: values[1],
    previousWeek: values[2],
    latestWeek: values[3],
    dates,
  };
}

// 見出しの日付は先頭の行（品目名順）を優先する
function headerDates(rows: PctChangeRow[]): Array<IsoDate | null> {
  return SLOTS.map((_, i) => rows.find((r) => r.dates[i] !== null)?.dates[i] ?? null);
}

export function buildColumns(header: Array<IsoDate | null>): PctChangeColumn[] {
  return [
    { id: 'commodity', name: ['Commodity', ''] },
    ...SLOTS.map((slot, i): PctChangeColumn => {
      const date = header[i];
      return { id: slot.id, name: [slot.label, date ? `(${formatDayMonthYear(date)})` : ''] };
    }),
  ];
}

export function pctChangeTable(
  series: PriceSeries,
  decimals = 2
): Pick<PriceQueryResult, 'pctChange' | 'columns' | 'misaligned'> {
  const groups = groupByCommodity(series);
  const rows: PctChangeRow[] = [];
  for (const name of [...groups.keys()].sort()) {
    const row = buildRow(groups.get(name) ?? [], decimals);
    if (row) rows.push(row);
  }
  if (rows.length === 0) {
    return { pctChange: [], columns: [], misaligned: false };
  }

  const header = headerDates(rows);
  const misaligned = rows.some((r) => r.dates.some((d, i) => d !== null && d !== header[i]));
  return { pctChange: rows, columns: buildColumns(header), misaligned };
}

export function queryPrices(
  series: PriceSeries,
  commodities: Iterable<string>,
  window: DateWindow,
  normalize: boolean,
  options: QueryOptions = {}
): PriceQueryResult {
  const selected = new Set(commodities);
  if (selected.size === 0 || window.start > window.end) return emptyResult();

  const filtered = series.filter(
    (r) => selected.has(r.commodity) && r.date >= window.start && r.date <= window.end
  );
  const out = normalize ? rebase(filtered) : filtered;

  return { series: out, ...pctChangeTable(out, options.decimals ?? 2) };
}

export function seriesBounds(series: PriceSeries): DateBounds | null {
  if (series.length === 0) return null;
  let min = series[0].date;
  let max = series[0].date;
  for (const r of series) {
    if (r.date < min) min = r.date;
    if (r.date > max) max = r.date;
  }
  return { min, max };
}

export function clampWindow(window: DateWindow, bounds: DateBounds): DateWindow {
  return {
    start: window.start < bounds.min ? bounds.min : window.start,
    end: window.end > bounds.max ? bounds.max : window.end,
  };
}

// 初期表示は直近 3 か月
export function defaultWindow(bounds: DateBounds, months = 3): DateWindow {
  return clampWindow({ start: addMonths(bounds.max, -months), end: bounds.max }, bounds);
}

export function chartTitle(commodities: string[]): string {
  return `Price Evolution of ${commodities.join(', ')}`;
}

export type ChartPoint = { date: IsoDate; [commodity: string]: number | string };

// recharts 用に日付ごとの横持ちへ
export function chartPoints(series: PriceSeries): ChartPoint[] {
  const byDate = new Map<IsoDate, ChartPoint>();
  for (const r of series) {
    const point = byDate.get(r.date) ?? { date: r.date };
    point[r.commodity] = r.price;
    byDate.set(r.date, point);
  }
  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}
