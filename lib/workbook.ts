// lib/workbook.ts

import ExcelJS from 'exceljs';
import { COMMODITIES, isCommodity } from './commodities';
import { isWeekend, parseDateLabel, weekEndingFriday } from './dates';
import { DataFormatError } from './errors';
import type { IsoDate, MissingPricePolicy, PriceRecord, PriceSeries } from './types';

export type WorkbookLayout = {
  sheetName: string;
  headerRow: number;        // 日付ラベルの行
  firstRow: number;         // 品目の最初の行
  lastRow: number;          // 品目の最後の行
  nameColumn: number;       // 品目名の列
  firstValueColumn: number; // 価格の最初の列
};

// ヘッダー行の下の 0 始まり 54..75 行目 = シート上の 56..77 行目
export const DEFAULT_LAYOUT: WorkbookLayout = {
  sheetName: 'State_Consolidated_TimeSeries',
  headerRow: 1,
  firstRow: 56,
  lastRow: 77,
  nameColumn: 2,
  firstValueColumn: 3,
};

export type LoadOptions = {
  layout?: Partial<WorkbookLayout>;
  missingPrices?: MissingPricePolicy;
};

// 転置後の表：1 行 = 1 日付ラベル、列 = 品目
type WideTable = {
  commodities: string[];
  rows: Array<{ label: ExcelJS.CellValue; values: Array<number | null> }>;
};

type DatedRow = {
  date: IsoDate;
  values: Array<number | null>;
};

function normalizeName(v: ExcelJS.CellValue): string {
  if (v == null) return '';
  if (typeof v === 'object' && !(v instanceof Date) && 'richText' in v) {
    return v.richText.map((t) => t.text).join('').trim();
  }
  if (typeof v === 'object' && !(v instanceof Date) && 'text' in v) {
    return String(v.text).trim();
  }
  return String(v).trim();
}

function cellToNumber(v: ExcelJS.CellValue): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string') {
    const s = v.replace(/,/g, '').trim();
    if (!s) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  // 数式セルは計算結果を使う
  if (v != null && typeof v === 'object' && 'result' in v) {
    return typeof v.result === 'number' && Number.isFinite(v.result) ? v.result : null;
  }
  return null;
}

function cellToLabel(v: ExcelJS.CellValue): ExcelJS.CellValue {
  if (v != null && typeof v === 'object' && !(v instanceof Date) && 'result' in v) {
    const r = v.result;
    return r instanceof Date || typeof r === 'number' || typeof r === 'string' ? r : null;
  }
  return v;
}

function readRegion(ws: ExcelJS.Worksheet, layout: WorkbookLayout): WideTable {
  if (ws.rowCount < layout.lastRow) {
    throw new DataFormatError(
      `${ws.name}: expected commodity rows ${layout.firstRow}-${layout.lastRow}, sheet has ${ws.rowCount} rows`
    );
  }

  const commodities: string[] = [];
  for (let r = layout.firstRow; r <= layout.lastRow; r++) {
    commodities.push(normalizeName(ws.getCell(r, layout.nameColumn).value));
  }

  const rows: WideTable['rows'] = [];
  for (let c = layout.firstValueColumn; c <= ws.columnCount; c++) {
    const values: Array<number | null> = [];
    for (let r = layout.firstRow; r <= layout.lastRow; r++) {
      values.push(cellToNumber(ws.getCell(r, c).value));
    }
    const label = cellToLabel(ws.getCell(layout.headerRow, c).value);
    // 見出しも値もない列は末尾の空列
    if ((label == null || label === '') && values.every((v) => v === null)) continue;
    rows.push({ label, values });
  }

  if (rows.length === 0) {
    throw new DataFormatError(`${ws.name}: no date columns from column ${layout.firstValueColumn}`);
  }

  const missing = COMMODITIES.filter((name) => !commodities.includes(name));
  if (missing.length > 0) {
    throw new DataFormatError(`${ws.name}: commodity rows not found: ${missing.join(', ')}`);
  }

  return { commodities, rows };
}

function applyMissingPolicy(table: WideTable, policy: MissingPricePolicy): WideTable {
  if (policy === 'skip-value') return table;
  return {
    commodities: table.commodities,
    rows: table.rows.filter((row) => row.values.every((v) => v !== null)),
  };
}

function parseDates(table: WideTable, sheetName: string): DatedRow[] {
  return table.rows.map((row) => {
    const date = parseDateLabel(row.label);
    if (!date) {
      throw new DataFormatError(`${sheetName}: unreadable date label "${String(row.label)}"`);
    }
    return { date, values: row.values };
  });
}

// 金曜締めの週ごとに平均する。観測のない週・品目は出力しない
function resampleWeekly(rows: DatedRow[], width: number): DatedRow[] {
  const buckets = new Map<IsoDate, { sums: number[]; counts: number[] }>();

  for (const row of rows) {
    const key = weekEndingFriday(row.date);
    const bucket = buckets.get(key) ?? {
      sums: new Array<number>(width).fill(0),
      counts: new Array<number>(width).fill(0),
    };
    buckets.set(key, bucket);
    row.values.forEach((v, i) => {
      if (v === null) return;
      bucket.sums[i] += v;
      bucket.counts[i] += 1;
    });
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, { sums, counts }]) => ({
      date,
      values: sums.map((s, i) => (counts[i] > 0 ? s / counts[i] : null)),
    }));
}

function melt(rows: DatedRow[], commodities: string[]): PriceSeries {
  const records: PriceRecord[] = [];
  for (const row of rows) {
    commodities.forEach((name, i) => {
      const price = row.values[i];
      if (!isCommodity(name) || price === null) return;
      records.push({ date: row.date, commodity: name, price });
    });
  }
  return records;
}

export function compareRecords(a: PriceRecord, b: PriceRecord): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.commodity === b.commodity) return 0;
  return a.commodity < b.commodity ? -1 : 1;
}

// Workbook → 週次の縦持ち価格系列
export function buildPriceSeriesFromWorkbook(
  wb: ExcelJS.Workbook,
  options: LoadOptions = {}
): PriceSeries {
  const layout: WorkbookLayout = { ...DEFAULT_LAYOUT, ...options.layout };
  const policy = options.missingPrices ?? 'drop-date';

  const ws = wb.getWorksheet(layout.sheetName);
  if (!ws) {
    throw new DataFormatError(`Worksheet "${layout.sheetName}" not found`);
  }

  const table = applyMissingPolicy(readRegion(ws, layout), policy);
  const weekdays = parseDates(table, ws.name).filter((row) => !isWeekend(row.date));
  const weekly = resampleWeekly(weekdays, table.commodities.length);

  return melt(weekly, table.commodities).sort(compareRecords);
}

export async function loadPriceSeries(path: string, options: LoadOptions = {}): Promise<PriceSeries> {
  const wb = new ExcelJS.Workbook();
  try {
    await wb.xlsx.readFile(path);
  } catch (error) {
    throw new DataFormatError(`Could not read workbook ${path}`, { cause: error });
  }
  return buildPriceSeriesFromWorkbook(wb, options);
}
