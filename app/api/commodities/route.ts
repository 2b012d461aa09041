// app/api/commodities/route.ts

import { NextResponse } from 'next/server';
import { getDashboardService } from '@/lib/dashboard';
import { errorResponse } from '@/lib/http';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    return NextResponse.json(await getDashboardService().getOverview());
  } catch (e) {
    return errorResponse(e, 'Failed to load the price workbook');
  }
}
