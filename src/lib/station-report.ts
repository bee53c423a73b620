import { ReportParseError } from './errors';
import { formatReport } from './format';
import { parseMetar } from './metar-parser';
import { DECODER_VERSION } from './report';
import { parseTaf } from './taf-parser';
import type { AwcMetarEntry, MetarRecord, ParseOptions, TafRecord } from './types';

export type DecodedSection<R> =
  | { status: 'ok'; record: R; text: string }
  | { status: 'error'; error: string; raw: string | null };

export interface StationReport {
  station: string;
  name: string | null;
  receiptTime: string | null;
  decoderVersion: string;
  metar: DecodedSection<MetarRecord>;
  taf: DecodedSection<TafRecord>;
}

function decodeSection<R extends MetarRecord | TafRecord>(
  label: string,
  raw: string | undefined,
  parse: (raw: string, options: ParseOptions) => R,
  options: ParseOptions
): DecodedSection<R> {
  if (!raw) return { status: 'error', error: `No ${label} available`, raw: null };
  try {
    const record = parse(raw, options);
    return { status: 'ok', record, text: formatReport(record) };
  } catch (error) {
    // Only a report that cannot be identified lands here; the raw text is kept for manual reading
    if (error instanceof ReportParseError) {
      return { status: 'error', error: error.message, raw };
    }
    throw error;
  }
}

// One route entry: the latest METAR and TAF for a station, decoded and formatted
export function buildStationReport(station: string, entry?: AwcMetarEntry): StationReport {
  const options: ParseOptions = entry?.receiptTime ? { receiptTime: entry.receiptTime } : {};
  return {
    station,
    name: entry?.name ?? null,
    receiptTime: entry?.receiptTime ?? null,
    decoderVersion: DECODER_VERSION,
    metar: decodeSection('METAR', entry?.rawOb, parseMetar, options),
    taf: decodeSection('TAF', entry?.rawTaf, parseTaf, options),
  };
}
