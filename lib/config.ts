// lib/config.ts
// 環境変数から設定を読む（scripts では dotenv で .env.local を読み込む）

import path from 'path';
import { ConfigError } from './errors';
import { DEFAULT_RAINFALL_URL } from './imd';
import { DEFAULT_MARKER } from './rainfall';
import type { MissingPricePolicy } from './types';
import { DEFAULT_LAYOUT } from './workbook';

export type DashboardConfig = {
  workbookPath: string;
  sheetName: string;
  missingPrices: MissingPricePolicy;
  cacheTtlSeconds: number;
  redisUrl?: string;
  rainfallUrl: string;
  rainfallMarker: string;
  rainfallTimeoutMs: number;
  cronSecret?: string;
};

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return n;
}

function readPolicy(env: Env): MissingPricePolicy {
  const raw = env.MISSING_PRICE_POLICY?.trim();
  if (!raw) return 'drop-date';
  if (raw === 'drop-date' || raw === 'skip-value') return raw;
  throw new ConfigError(`MISSING_PRICE_POLICY must be "drop-date" or "skip-value" (got "${raw}")`);
}

function readUrl(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  try {
    return new URL(raw).toString();
  } catch (error) {
    throw new ConfigError(`${name} is not a valid URL (got "${raw}")`, { cause: error });
  }
}

export function loadConfig(env: Env = process.env): DashboardConfig {
  return {
    workbookPath: path.resolve(process.cwd(), env.DCA_WORKBOOK_PATH?.trim() || 'data/dca_data.xlsx'),
    sheetName: env.DCA_SHEET_NAME?.trim() || DEFAULT_LAYOUT.sheetName,
    missingPrices: readPolicy(env),
    cacheTtlSeconds: readPositiveInt(env, 'CACHE_TTL_SECONDS', 300),
    redisUrl: env.REDIS_URL?.trim() || undefined,
    rainfallUrl: readUrl(env, 'RAINFALL_URL', DEFAULT_RAINFALL_URL),
    rainfallMarker: env.RAINFALL_MARKER?.trim() || DEFAULT_MARKER,
    rainfallTimeoutMs: readPositiveInt(env, 'RAINFALL_TIMEOUT_MS', 30000),
    cronSecret: env.CRON_SECRET?.trim() || undefined,
  };
}
