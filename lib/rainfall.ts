// lib/rainfall.ts
// 州別降雨量ページの埋め込みデータを読み取る

import * as cheerio from 'cheerio';
import { ScrapeError } from './errors';
import type { RainfallRecord } from './types';

export const DEFAULT_MARKER = 'AmCharts';

const AREAS_PREFIX = '"areas": ';
const AREAS_START = `${AREAS_PREFIX}[`;

type RawArea = {
  id?: unknown;
  title?: unknown;
  balloonText?: unknown;
};

const ACTUAL_RE = /Actual\s*:\s*(-?\d+(?:\.\d+)?)\s*mm/i;
const NORMAL_RE = /Normal\s*:\s*(-?\d+(?:\.\d+)?)\s*mm/i;
const DEPARTURE_RE = /Departure\s*:\s*([-+]?\d+)\s*%/i;

// マーカーを含む最初の script 本文
export function findChartScript(html: string, marker = DEFAULT_MARKER): string {
  const $ = cheerio.load(html);
  const script = $('script')
    .filter((_, el) => ($(el).html() ?? '').includes(marker))
    .first();

  if (script.length === 0) {
    throw new ScrapeError(`No inline script containing "${marker}"`);
  }
  return script.html() ?? '';
}

// `"areas": [` から最初の `]` までを切り出す
export function extractAreasLiteral(script: string): string {
  const start = script.indexOf(AREAS_START);
  if (start < 0) {
    throw new ScrapeError('Map data has no "areas" list');
  }
  const end = script.indexOf(']', start);
  if (end < 0) {
    throw new ScrapeError('"areas" list is not closed');
  }
  return script.slice(start, end + 1);
}

// キーが引用符なしのオブジェクトリテラルを JSON にする
export function repairAreasLiteral(literal: string): string {
  const body = literal.startsWith(AREAS_PREFIX) ? literal.slice(AREAS_PREFIX.length) : literal;
  return body.replace(/(\w+):/g, '"$1":');
}

function parseAreas(json: string): RawArea[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ScrapeError('Could not parse "areas" list', { cause: error });
  }
  if (!Array.isArray(parsed)) {
    throw new ScrapeError('"areas" is not a list');
  }
  return parsed.filter((a): a is RawArea => typeof a === 'object' && a !== null);
}

function hasId(area: RawArea): boolean {
  if (area.id == null) return false;
  const id = String(area.id).trim();
  return id !== '' && id !== 'null';
}

function matchNumber(text: string, re: RegExp): number | null {
  const m = re.exec(text);
  return m ? Number(m[1]) : null;
}

export function parseBalloonText(text: string): Omit<RainfallRecord, 'state'> {
  return {
    actualMm: matchNumber(text, ACTUAL_RE),
    normalMm: matchNumber(text, NORMAL_RE),
    deviationPct: matchNumber(text, DEPARTURE_RE),
  };
}

function titleCase(s: string): string {
  return s.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, sep: string, ch: string) => sep + ch.toUpperCase());
}

// 境界データの州名（例: "Jammu and Kashmir"）に合わせる
export function normalizeStateName(title: string): string {
  let name = titleCase(title.trim().replace(/\s*\(ut\)$/i, ''));
  if (name.includes('Jammu')) {
    name = name.replace(/&/g, 'and');
  }
  return name;
}

export function parseRainfallHtml(html: string, marker = DEFAULT_MARKER): RainfallRecord[] {
  const script = findChartScript(html, marker);
  const areas = parseAreas(repairAreasLiteral(extractAreasLiteral(script)));

  return areas.filter(hasId).map((area) => ({
    state: normalizeStateName(typeof area.title === 'string' ? area.title : ''),
    ...parseBalloonText(typeof area.balloonText === 'string' ? area.balloonText : ''),
  }));
}
