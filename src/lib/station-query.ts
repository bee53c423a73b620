export const DEFAULT_STATION = 'EGLL';
export const MAX_STATIONS = 10;

const STATION_QUERY_PATTERN = /^[A-Z0-9]{3,5}$/;

export type StationQuery =
  | { ok: true; ids: string[] }
  | { ok: false; error: string };

function normalizeId(rawId: string): string {
  return rawId.trim().toUpperCase();
}

/**
 * Normalizes the comma-separated `ids` query parameter: trims, uppercases,
 * drops blanks and repeats. An absent or blank parameter falls back to the
 * default station.
 */
export function normalizeStationQuery(rawIds?: string | null): StationQuery {
  const ids = [...new Set((rawIds ?? '').split(',').map(normalizeId).filter(Boolean))];
  if (ids.length === 0) return { ok: true, ids: [DEFAULT_STATION] };

  const invalid = ids.find((id) => !STATION_QUERY_PATTERN.test(id));
  if (invalid) {
    return { ok: false, error: `Invalid station id "${invalid}"` };
  }
  if (ids.length > MAX_STATIONS) {
    return { ok: false, error: `At most ${MAX_STATIONS} stations per request` };
  }
  return { ok: true, ids };
}
