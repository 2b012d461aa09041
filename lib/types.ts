// lib/types.ts

import type { Commodity } from './commodities';

export type IsoDate = string; // 'YYYY-MM-DD'

export type PriceRecord = {
  date: IsoDate;          // 金曜締めの週
  commodity: Commodity;
  price: number;
};

// (date, commodity) 昇順
export type PriceSeries = PriceRecord[];

export type DateWindow = {
  start: IsoDate;
  end: IsoDate;
};

export type DateBounds = {
  min: IsoDate;
  max: IsoDate;
};

export type PctChangeSlot = 'threeWeeksAgo' | 'twoWeeksAgo' | 'previousWeek' | 'latestWeek';

export type PctChangeRow = {
  commodity: Commodity;
  threeWeeksAgo: number | null;
  twoWeeksAgo: number | null;
  previousWeek: number | null;
  latestWeek: number | null;
  dates: Array<IsoDate | null>; // スロットごと、古い順
};

export type PctChangeColumn = {
  id: 'commodity' | PctChangeSlot;
  name: [string, string];
};

export type PriceQueryResult = {
  series: PriceSeries;
  pctChange: PctChangeRow[];
  columns: PctChangeColumn[];
  misaligned: boolean;
};

export type RainfallPeriod = 'Daily' | 'Weekly' | 'Monthly' | 'Cumulative';

export type RainfallRecord = {
  state: string;
  actualMm: number | null;
  normalMm: number | null;
  deviationPct: number | null;
};

export type MissingPricePolicy = 'drop-date' | 'skip-value';
