// lib/export.ts

import ExcelJS from 'exceljs';
import { toUtcDate } from './dates';
import type { PctChangeSlot, PriceQueryResult } from './types';

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const HEADER_FILL: ExcelJS.Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FF2980B9' },
};

function styleHeader(row: ExcelJS.Row): void {
  row.font = { bold: true, color: { argb: 'FFFFFFFF' } };
  row.eachCell((cell) => {
    cell.fill = HEADER_FILL;
  });
}

// 価格系列と前週比の表をそれぞれのシートに書き出す
export function buildDownloadWorkbook(result: Pick<PriceQueryResult, 'series' | 'pctChange' | 'columns'>): ExcelJS.Workbook {
  const wb = new ExcelJS.Workbook();

  const prices = wb.addWorksheet('Prices');
  prices.columns = [
    { header: 'Date', key: 'date', width: 12, style: { numFmt: 'yyyy-mm-dd' } },
    { header: 'Commodity', key: 'commodity', width: 18 },
    { header: 'Price', key: 'price', width: 10, style: { numFmt: '0.00' } },
  ];
  styleHeader(prices.getRow(1));
  for (const r of result.series) {
    prices.addRow({ date: toUtcDate(r.date), commodity: r.commodity, price: r.price });
  }

  const momentum = wb.addWorksheet('Week-on-Week');
  if (result.columns.length > 0) {
    // 2 段の見出し（ラベル / 日付）
    momentum.addRow(result.columns.map((c) => c.name[0]));
    momentum.addRow(result.columns.map((c) => c.name[1]));
    styleHeader(momentum.getRow(1));
    styleHeader(momentum.getRow(2));

    const slots = result.columns
      .map((c) => c.id)
      .filter((id): id is PctChangeSlot => id !== 'commodity');
    for (const row of result.pctChange) {
      momentum.addRow([row.commodity, ...slots.map((s) => row[s])]);
    }
    momentum.getColumn(1).width = 18;
  }

  return wb;
}
