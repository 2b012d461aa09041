// app/api/rainfall/route.ts

import { NextRequest, NextResponse } from 'next/server';
import { getDashboardService } from '@/lib/dashboard';
import { errorResponse } from '@/lib/http';
import { parseRainfallPeriod } from '@/lib/params';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(req: NextRequest) {
  try {
    const period = parseRainfallPeriod(req.nextUrl.searchParams);
    const records = await getDashboardService().getRainfall(period);
    return NextResponse.json({ period, records });
  } catch (e) {
    return errorResponse(e, 'Failed to load rainfall data');
  }
}
