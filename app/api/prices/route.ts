// app/api/prices/route.ts

import { NextRequest, NextResponse } from 'next/server';
import { getDashboardService } from '@/lib/dashboard';
import { errorResponse } from '@/lib/http';
import { parsePriceQuery } from '@/lib/params';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(req: NextRequest) {
  try {
    const query = parsePriceQuery(req.nextUrl.searchParams);
    const result = await getDashboardService().query(query);
    return NextResponse.json(result);
  } catch (e) {
    return errorResponse(e, 'Failed to load prices');
  }
}
