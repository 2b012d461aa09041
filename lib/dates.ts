// lib/dates.ts
// 日付はすべて UTC の 'YYYY-MM-DD' 文字列で扱う

import type { IsoDate } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

// Excel の 1900 年基準シリアル値の 0 日目（1899-12-30）
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);

const ISO_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const DAY_FIRST_RE = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function fromParts(y: number, m: number, d: number): IsoDate | null {
  const t = Date.UTC(y, m - 1, d);
  const dt = new Date(t);
  if (dt.getUTCFullYear() !== y || dt.getUTCMonth() !== m - 1 || dt.getUTCDate() !== d) {
    return null;
  }
  return toIsoDate(dt);
}

export function toIsoDate(d: Date): IsoDate {
  return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
}

export function toUtcDate(iso: IsoDate): Date {
  const m = ISO_RE.exec(iso);
  if (!m) throw new RangeError(`Not an ISO date: ${iso}`);
  return new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
}

export function isIsoDate(value: string): boolean {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  return !!m && fromParts(Number(m[1]), Number(m[2]), Number(m[3])) === value;
}

export function excelSerialToIso(serial: number): IsoDate {
  return toIsoDate(new Date(EXCEL_EPOCH_MS + Math.floor(serial) * DAY_MS));
}

// ワークブックの日付ラベル（Date / シリアル値 / 文字列）を解釈する
export function parseDateLabel(value: unknown): IsoDate | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : toIsoDate(value);
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? excelSerialToIso(value) : null;
  }
  if (typeof value !== 'string') return null;

  const str = value.trim();
  const iso = ISO_RE.exec(str);
  if (iso) return fromParts(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  // 日付ラベルは日-月-年の並び
  const dayFirst = DAY_FIRST_RE.exec(str);
  if (dayFirst) {
    return fromParts(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }
  return null;
}

export function addDays(iso: IsoDate, days: number): IsoDate {
  return toIsoDate(new Date(toUtcDate(iso).getTime() + days * DAY_MS));
}

// 0 = 日曜 … 6 = 土曜
export function weekday(iso: IsoDate): number {
  return toUtcDate(iso).getUTCDay();
}

export function isWeekend(iso: IsoDate): boolean {
  const w = weekday(iso);
  return w === 0 || w === 6;
}

// 週次（金曜締め）の区切り日：その日以降で最初の金曜日
export function weekEndingFriday(iso: IsoDate): IsoDate {
  return addDays(iso, (5 - weekday(iso) + 7) % 7);
}

// 月単位でずらす。日は月末で切り詰める（31日 - 1か月 → 30日 など）
export function addMonths(iso: IsoDate, months: number): IsoDate {
  const d = toUtcDate(iso);
  const total = d.getUTCFullYear() * 12 + d.getUTCMonth() + months;
  const y = Math.floor(total / 12);
  const m = total - y * 12;
  const lastDay = new Date(Date.UTC(y, m + 1, 0)).getUTCDate();
  return toIsoDate(new Date(Date.UTC(y, m, Math.min(d.getUTCDate(), lastDay))));
}

export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((toUtcDate(to).getTime() - toUtcDate(from).getTime()) / DAY_MS);
}

// 表のヘッダー用（例: 05-01-24）
export function formatDayMonthYear(iso: IsoDate): string {
  const d = toUtcDate(iso);
  return `${pad2(d.getUTCDate())}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCFullYear() % 100)}`;
}
