import ExcelJS from 'exceljs';
import { describe, expect, it } from 'vitest';
import { COMMODITIES } from './commodities';
import { daysBetween, weekday } from './dates';
import { DataFormatError } from './errors';
import { DEFAULT_LAYOUT, buildPriceSeriesFromWorkbook } from './workbook';

type Price = (commodityIndex: number, date: Date) => number | null;

// 品目 i の日付 d の価格 = 10 * (i + 1) + 日
const basePrice: Price = (i, date) => 10 * (i + 1) + date.getUTCDate();

function day(d: number, month = 0): Date {
  return new Date(Date.UTC(2024, month, d));
}

function makeWorkbook(
  dates: Array<Date | string>,
  price: Price = basePrice,
  names: readonly string[] = COMMODITIES
): ExcelJS.Workbook {
  const wb = new ExcelJS.Workbook();
  const ws = wb.addWorksheet(DEFAULT_LAYOUT.sheetName);
  ws.getCell(1, 1).value = 'State';
  ws.getCell(1, 2).value = 'Commodity';
  dates.forEach((label, j) => {
    ws.getCell(1, 3 + j).value = label;
  });
  names.forEach((name, i) => {
    const row = DEFAULT_LAYOUT.firstRow + i;
    ws.getCell(row, 1).value = 'All India';
    ws.getCell(row, 2).value = name;
    dates.forEach((label, j) => {
      const date = label instanceof Date ? label : day(Number(label.slice(0, 2)) || 1);
      const v = price(i, date);
      if (v !== null) ws.getCell(row, 3 + j).value = v;
    });
  });
  return wb;
}

// 2024-01-01 は月曜日
const TWO_WEEKS = [day(1), day(2), day(3), day(4), day(5), day(6), day(8), day(9), day(10), day(11), day(12)];

function pricesOf(series: ReturnType<typeof buildPriceSeriesFromWorkbook>, commodity: string) {
  return series.filter((r) => r.commodity === commodity).map((r) => [r.date, r.price]);
}

describe('buildPriceSeriesFromWorkbook', () => {
  it('averages weekdays into weeks ending Friday and ignores Saturdays', () => {
    const series = buildPriceSeriesFromWorkbook(
      makeWorkbook(TWO_WEEKS, (i, d) => (d.getUTCDay() === 6 ? 999 : basePrice(i, d)))
    );

    expect(series).toHaveLength(2 * COMMODITIES.length);
    expect(pricesOf(series, 'Rice')).toEqual([
      ['2024-01-05', 13],
      ['2024-01-12', 20],
    ]);
    expect(pricesOf(series, 'Wheat')).toEqual([
      ['2024-01-05', 23],
      ['2024-01-12', 30],
    ]);
  });

  it('sorts by date, then commodity name', () => {
    const series = buildPriceSeriesFromWorkbook(makeWorkbook(TWO_WEEKS));
    const firstWeek = series.slice(0, COMMODITIES.length);

    expect(firstWeek.every((r) => r.date === '2024-01-05')).toBe(true);
    expect(firstWeek.map((r) => r.commodity)).toEqual([...COMMODITIES].sort());
    expect(series[0]).toEqual({ date: '2024-01-05', commodity: 'Atta(wheat)', price: 33 });
  });

  it('is deterministic for the same workbook', () => {
    const wb = makeWorkbook(TWO_WEEKS);
    expect(buildPriceSeriesFromWorkbook(wb)).toEqual(buildPriceSeriesFromWorkbook(wb));
  });

  it('never emits weekend dates and spaces weeks seven days apart', () => {
    const dates: Date[] = [];
    for (let d = 1; d <= 26; d++) dates.push(day(d));
    const series = buildPriceSeriesFromWorkbook(makeWorkbook(dates));

    expect(series.every((r) => weekday(r.date) === 5)).toBe(true);
    const rice = series.filter((r) => r.commodity === 'Rice').map((r) => r.date);
    expect(rice).toEqual(['2024-01-05', '2024-01-12', '2024-01-19', '2024-01-26']);
    for (let i = 1; i < rice.length; i++) {
      expect(daysBetween(rice[i - 1], rice[i])).toBe(7);
    }
  });

  it('drops a whole date when any commodity is missing a price', () => {
    const milk = COMMODITIES.indexOf('Milk');
    const wb = makeWorkbook(TWO_WEEKS, (i, d) =>
      i === milk && d.getUTCDate() === 5 ? null : basePrice(i, d)
    );
    const series = buildPriceSeriesFromWorkbook(wb);

    expect(pricesOf(series, 'Rice')[0]).toEqual(['2024-01-05', 12.5]);
    expect(pricesOf(series, 'Milk')[0]).toEqual(['2024-01-05', 202.5]);
  });

  it('keeps the date under the skip-value policy', () => {
    const milk = COMMODITIES.indexOf('Milk');
    const wb = makeWorkbook(TWO_WEEKS, (i, d) =>
      i === milk && d.getUTCDate() === 5 ? null : basePrice(i, d)
    );
    const series = buildPriceSeriesFromWorkbook(wb, { missingPrices: 'skip-value' });

    expect(pricesOf(series, 'Rice')[0]).toEqual(['2024-01-05', 13]);
    expect(pricesOf(series, 'Milk')[0]).toEqual(['2024-01-05', 202.5]);
  });

  it('omits a commodity for a week with no observations instead of emitting NaN', () => {
    const tea = COMMODITIES.indexOf('Tea');
    const wb = makeWorkbook(TWO_WEEKS, (i, d) =>
      i === tea && d.getUTCDate() <= 6 ? null : basePrice(i, d)
    );
    const series = buildPriceSeriesFromWorkbook(wb, { missingPrices: 'skip-value' });

    expect(pricesOf(series, 'Tea')).toEqual([['2024-01-12', 220]]);
    expect(series.every((r) => Number.isFinite(r.price))).toBe(true);
  });

  it('reads day-first text date labels', () => {
    const series = buildPriceSeriesFromWorkbook(makeWorkbook(['08-01-2024', '09-01-2024']));
    expect(pricesOf(series, 'Rice')).toEqual([['2024-01-12', 18.5]]);
  });

  it('fails when a commodity row is missing', () => {
    const names = COMMODITIES.map((n) => (n === 'Salt' ? 'Iodised Salt' : n));
    expect(() => buildPriceSeriesFromWorkbook(makeWorkbook(TWO_WEEKS, basePrice, names))).toThrow(
      DataFormatError
    );
  });

  it('fails when the worksheet is absent', () => {
    const wb = makeWorkbook(TWO_WEEKS);
    expect(() => buildPriceSeriesFromWorkbook(wb, { layout: { sheetName: 'Other' } })).toThrow(
      'Worksheet "Other" not found'
    );
  });

  it('fails when the sheet ends before the commodity block', () => {
    const wb = new ExcelJS.Workbook();
    wb.addWorksheet(DEFAULT_LAYOUT.sheetName).getCell(1, 3).value = day(1);
    expect(() => buildPriceSeriesFromWorkbook(wb)).toThrow(DataFormatError);
  });

  it('fails on an unreadable date label', () => {
    expect(() => buildPriceSeriesFromWorkbook(makeWorkbook(['01-01-2024', 'Total']))).toThrow(
      'unreadable date label "Total"'
    );
  });
});
