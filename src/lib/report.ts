import { parseMetar } from './metar-parser';
import { parseTaf } from './taf-parser';
import { scanReport } from './tokens';
import type { MetarRecord, ParseOptions, TafRecord } from './types';

// Static metadata reported alongside decoded records
export const DECODER_VERSION = '1.0.0';

export type ReportKind = 'metar' | 'taf';

export type DecodedReport =
  | { kind: 'metar'; record: MetarRecord }
  | { kind: 'taf'; record: TafRecord };

/**
 * A TAF either says so in its first group or has a DDHH/DDHH validity
 * period right after the issue time (AMD/COR/AUTO may sit between them).
 */
export function detectReportKind(raw: string): ReportKind {
  const tokens = scanReport(raw);
  const first = tokens[0].value;
  if (first === 'TAF') return 'taf';
  if (first === 'METAR' || first === 'SPECI') return 'metar';

  const timeAt = tokens.findIndex((token) => token.kind === 'dayTime');
  if (timeAt === -1) return 'metar';
  const next = tokens.slice(timeAt + 1).find((token) => !['AMD', 'COR', 'AUTO'].includes(token.value));
  return next?.kind === 'period' ? 'taf' : 'metar';
}

export function decodeReport(raw: string, options: ParseOptions = {}): DecodedReport {
  return detectReportKind(raw) === 'taf'
    ? { kind: 'taf', record: parseTaf(raw, options) }
    : { kind: 'metar', record: parseMetar(raw, options) };
}

// Receipt time comes from the data source, never from the report text
export function withReceiptTime<T extends MetarRecord | TafRecord>(record: T, receiptTime: string): T {
  return { ...record, receiptTime };
}
