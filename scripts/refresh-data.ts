// scripts/refresh-data.ts
// ローカルから実行するデータ更新スクリプト（Redis 設定時は共有キャッシュを温める）

import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(process.cwd(), '.env.local') });

import { MemoizedCache, RedisCacheStore, createCacheStore } from '../lib/cache';
import { loadConfig } from '../lib/config';
import { createDashboardService } from '../lib/dashboard';
import { errorMessage } from '../lib/errors';
import { RAINFALL_PERIODS } from '../lib/imd';

async function main(): Promise<number> {
  const settings = loadConfig();
  const store = createCacheStore(settings.redisUrl);
  const service = createDashboardService({ config: settings, cache: new MemoizedCache(store) });

  try {
    console.log('='.repeat(60));
    console.log('Refreshing dashboard data...');
    console.log(`Started: ${new Date().toLocaleString('en-IN')}`);
    console.log('='.repeat(60));

    const startTime = Date.now();

    console.log(`\n[1/${RAINFALL_PERIODS.length + 1}] Loading workbook ${settings.workbookPath}`);
    const prices = await service.refreshPrices();
    console.log(`${prices.records} weekly records, ${prices.bounds.min} to ${prices.bounds.max}`);

    let failures = 0;
    for (const [i, period] of RAINFALL_PERIODS.entries()) {
      console.log(`\n[${i + 2}/${RAINFALL_PERIODS.length + 1}] Scraping ${period} rainfall`);
      try {
        const states = await service.refreshRainfall(period);
        console.log(`${states} states`);
      } catch (error) {
        failures += 1;
        console.error(`${period} rainfall failed: ${errorMessage(error, 'unknown error')}`);
      }
    }

    console.log('\n' + '='.repeat(60));
    console.log(failures === 0 ? '✓ Refresh complete' : `✗ Refresh finished with ${failures} failure(s)`);
    console.log(`Total time: ${Date.now() - startTime}ms`);
    console.log('='.repeat(60));
    return failures === 0 ? 0 : 1;
  } catch (error) {
    console.error('\n' + '='.repeat(60));
    console.error('✗ Refresh failed:');
    console.error(errorMessage(error, 'unknown error'));
    if (error instanceof Error && error.stack) {
      console.error('\nStack trace:');
      console.error(error.stack);
    }
    console.error('='.repeat(60));
    return 1;
  } finally {
    if (store instanceof RedisCacheStore) {
      await store.disconnect();
    }
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
