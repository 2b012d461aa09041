// lib/commodities.ts

// ドロップダウンの表示順（表の並びは名前順で、この順ではない）
export const COMMODITIES = [
  'Rice',
  'Wheat',
  'Atta(wheat)',
  'Gram Dal',
  'Tur/Arhar Dal',
  'Urad Dal',
  'Moong Dal',
  'Masoor Dal',
  'Ground Nut Oil',
  'Mustard Oil',
  'Vanaspati',
  'Soya Oil',
  'Sunflower Oil',
  'Palm Oil',
  'Potato',
  'Onion',
  'Tomato',
  'Sugar',
  'Gur',
  'Milk',
  'Tea',
  'Salt',
] as const;

export type Commodity = (typeof COMMODITIES)[number];

const COMMODITY_SET: ReadonlySet<string> = new Set(COMMODITIES);

export function isCommodity(name: string): name is Commodity {
  return COMMODITY_SET.has(name);
}
