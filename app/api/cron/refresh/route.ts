// app/api/cron/refresh/route.ts
// Vercel Cron Jobs 用：ワークブックと降雨量ページを読み直してキャッシュを温める

import { NextRequest, NextResponse } from 'next/server';
import { getDashboardService } from '@/lib/dashboard';
import { loadConfig } from '@/lib/config';
import { errorResponse } from '@/lib/http';
import { RAINFALL_PERIODS } from '@/lib/imd';
import { withRetries } from '@/lib/retry';

export const runtime = 'nodejs';
export const maxDuration = 300;

export async function GET(request: NextRequest) {
  try {
    const { cronSecret } = loadConfig();
    const authHeader = request.headers.get('authorization');
    if (!cronSecret || authHeader !== `Bearer ${cronSecret}`) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
    }

    console.log('Cron: refreshing dashboard data');
    const service = getDashboardService();

    const prices = await withRetries(() => service.refreshPrices(), { label: 'Price workbook' });

    const rainfall: Array<{ period: string; states: number }> = [];
    for (const period of RAINFALL_PERIODS) {
      const states = await withRetries(() => service.refreshRainfall(period), {
        label: `Rainfall (${period})`,
      });
      rainfall.push({ period, states });
    }

    console.log('Cron: refresh complete');
    return NextResponse.json({ success: true, prices, rainfall });
  } catch (e) {
    return errorResponse(e, 'Refresh failed');
  }
}
