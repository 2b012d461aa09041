// app/api/download-prices/route.ts

import { NextRequest, NextResponse } from 'next/server';
import { getDashboardService } from '@/lib/dashboard';
import { XLSX_CONTENT_TYPE, buildDownloadWorkbook } from '@/lib/export';
import { errorResponse } from '@/lib/http';
import { parsePriceQuery } from '@/lib/params';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function GET(req: NextRequest) {
  try {
    const query = parsePriceQuery(req.nextUrl.searchParams);
    const result = await getDashboardService().query(query);

    const wb = buildDownloadWorkbook(result);
    const outBuf = await wb.xlsx.writeBuffer();
    const filename = `commodity-prices_${result.window.start}_${result.window.end}.xlsx`;

    return new NextResponse(outBuf, {
      status: 200,
      headers: {
        'Content-Type': XLSX_CONTENT_TYPE,
        'Content-Disposition': `attachment; filename="${filename}"`,
      },
    });
  } catch (e) {
    return errorResponse(e, 'Download failed');
  }
}
