import { NextRequest, NextResponse } from 'next/server';
import { getStationReports } from '@/app/actions';
import { normalizeStationQuery } from '@/lib/station-query';
import { buildStationReport } from '@/lib/station-report';

export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  const query = normalizeStationQuery(request.nextUrl.searchParams.get('ids'));
  if (!query.ok) {
    return NextResponse.json({ error: query.error }, { status: 400 });
  }

  try {
    const entries = await getStationReports(query.ids);
    if (!entries) {
      return NextResponse.json(
        { error: 'Failed to fetch reports from the Aviation Weather API' },
        { status: 502 }
      );
    }

    return NextResponse.json({
      reports: query.ids.map((id) => buildStationReport(id, entries[id])),
    });
  } catch (error) {
    console.error('Report decode error:', error);
    return NextResponse.json(
      { error: 'Failed to decode reports' },
      { status: 500 }
    );
  }
}
