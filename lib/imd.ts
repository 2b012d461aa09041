// lib/imd.ts

import { ScrapeError } from './errors';
import { DEFAULT_MARKER, parseRainfallHtml } from './rainfall';
import type { RainfallPeriod, RainfallRecord } from './types';

export const DEFAULT_RAINFALL_URL =
  'https://mausam.imd.gov.in/responsive/rainfallinformation_state.php';

export const RAINFALL_PERIODS: RainfallPeriod[] = ['Daily', 'Weekly', 'Monthly', 'Cumulative'];

const PERIOD_CODE: Record<RainfallPeriod, string> = {
  Daily: 'D',
  Weekly: 'W',
  Monthly: 'M',
  Cumulative: 'C',
};

export type FetchRainfallOptions = {
  url?: string;
  marker?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export function isRainfallPeriod(value: string): value is RainfallPeriod {
  return RAINFALL_PERIODS.some((p) => p === value);
}

export function rainfallPageUrl(period: RainfallPeriod, base = DEFAULT_RAINFALL_URL): string {
  const url = new URL(base);
  url.searchParams.set('msg', PERIOD_CODE[period]);
  return url.toString();
}

async function fetchPage(url: string, timeoutMs: number, fetchImpl: typeof fetch): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    console.log(`Fetching rainfall page ${url}`);
    const startTime = Date.now();

    const resp = await fetchImpl(url, { cache: 'no-store', signal: controller.signal });
    if (!resp.ok) {
      throw new ScrapeError(`Rainfall page request failed (${resp.status})`);
    }
    const html = await resp.text();

    console.log(`Rainfall page fetched (${Date.now() - startTime}ms)`);
    return html;
  } catch (error) {
    if (error instanceof ScrapeError) throw error;
    if (error instanceof Error && error.name === 'AbortError') {
      throw new ScrapeError(`Rainfall page timed out after ${timeoutMs}ms`, { cause: error });
    }
    throw new ScrapeError('Rainfall page request failed', { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

// 失敗時は ScrapeError のみ。部分的な結果は返さない
export async function fetchRainfall(
  period: RainfallPeriod,
  options: FetchRainfallOptions = {}
): Promise<RainfallRecord[]> {
  const url = rainfallPageUrl(period, options.url);
  const html = await fetchPage(url, options.timeoutMs ?? 30000, options.fetchImpl ?? fetch);
  const records = parseRainfallHtml(html, options.marker ?? DEFAULT_MARKER);
  console.log(`Rainfall (${period}): ${records.length} states`);
  return records;
}
