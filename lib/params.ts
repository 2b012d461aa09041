// lib/params.ts

import { isCommodity, type Commodity } from './commodities';
import { isIsoDate } from './dates';
import { InvalidQueryError } from './errors';
import { isRainfallPeriod } from './imd';
import type { IsoDate, RainfallPeriod } from './types';

export type PriceQuery = {
  commodities: Commodity[];
  start?: IsoDate;
  end?: IsoDate;
  normalize: boolean;
};

function readDate(params: URLSearchParams, name: string): IsoDate | undefined {
  const raw = params.get(name)?.trim();
  if (!raw) return undefined;
  if (!isIsoDate(raw)) {
    throw new InvalidQueryError(`${name} must be a YYYY-MM-DD date (got "${raw}")`);
  }
  return raw;
}

function readFlag(params: URLSearchParams, name: string): boolean {
  const raw = params.get(name)?.trim().toLowerCase();
  if (!raw || raw === '0' || raw === 'false') return false;
  if (raw === '1' || raw === 'true') return true;
  throw new InvalidQueryError(`${name} must be true or false (got "${raw}")`);
}

export function parsePriceQuery(params: URLSearchParams): PriceQuery {
  const commodities: Commodity[] = [];
  for (const raw of params.getAll('commodity')) {
    const name = raw.trim();
    if (!isCommodity(name)) {
      throw new InvalidQueryError(`Unknown commodity "${name}"`);
    }
    if (!commodities.includes(name)) commodities.push(name);
  }

  return {
    commodities,
    start: readDate(params, 'start'),
    end: readDate(params, 'end'),
    normalize: readFlag(params, 'normalize'),
  };
}

export function parseRainfallPeriod(params: URLSearchParams): RainfallPeriod {
  const raw = params.get('period')?.trim() || 'Daily';
  if (!isRainfallPeriod(raw)) {
    throw new InvalidQueryError(`period must be Daily, Weekly, Monthly or Cumulative (got "${raw}")`);
  }
  return raw;
}
