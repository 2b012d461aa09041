// lib/deviation.ts

export type DeviationCategory =
  | 'Large Excess'
  | 'Excess'
  | 'Normal'
  | 'Deficient'
  | 'Large Deficient'
  | 'No Rain'
  | 'No Data';

// IMD の区分（%）: +60 以上 / +20〜+59 / -19〜+19 / -20〜-59 / -60〜-99 / -100
export function deviationCategory(pct: number | null): DeviationCategory {
  if (pct === null) return 'No Data';
  if (pct >= 60) return 'Large Excess';
  if (pct >= 20) return 'Excess';
  if (pct > -20) return 'Normal';
  if (pct > -60) return 'Deficient';
  if (pct > -100) return 'Large Deficient';
  return 'No Rain';
}
