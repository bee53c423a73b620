import { EmptyInputError } from './errors';

// Token Scanner
// Splits a raw METAR/TAF line into whitespace-delimited groups and tags each
// one with the shape it looks like. Classification is loose
// (e.g. anything ending in KT is a wind group); the field parsers apply the
// strict grammar and report a malformed group against its field.

export type TokenKind =
  | 'keyword'
  | 'fromTime'            // FM201830
  | 'probability'         // PROB30
  | 'period'              // 2018/2102
  | 'dayTime'             // 201650Z
  | 'windShear'           // WS020/05065KT
  | 'temperatureForecast' // TX15/2015Z
  | 'pressureForecast'    // QNH2992INS
  | 'wind'                // 31009KT
  | 'windVariation'       // 280V360
  | 'visibility'          // 9999, 1/2SM, P6SM
  | 'number'              // whole part of "1 1/2SM"
  | 'rvr'                 // R24/P1500
  | 'temperature'         // 03/M00
  | 'altimeter'           // Q1014, A2992
  | 'cloud'               // BKN019
  | 'weather'             // -SHRA
  | 'station'             // EGMC
  | 'unknown';

export interface Token {
  readonly text: string;  // as encoded
  readonly value: string; // text without a trailing end-of-message "="
  readonly kind: TokenKind;
  readonly index: number;
}

export const KEYWORDS = new Set([
  'METAR', 'SPECI', 'TAF',
  'AMD', 'COR', 'AUTO', 'NIL', 'NOT', 'SKED',
  'CAVOK', 'NSW', 'NSC', 'SKC', 'CLR', 'NCD',
  'BECMG', 'TEMPO', 'NOSIG', 'RMK',
]);

export const WEATHER_PATTERN =
  /^(-|\+|VC)?(MI|BC|PR|DR|BL|SH|TS|FZ)?((?:DZ|RA|SN|SG|IC|PL|GR|GS|UP|BR|FG|FU|VA|DU|SA|HZ|PY|PO|SQ|FC|SS|DS)*)$/;

export const STATION_PATTERN = /^[A-Z]{4}$/;

function isWeatherGroup(value: string): boolean {
  const match = value.match(WEATHER_PATTERN);
  return match !== null && Boolean(match[2] || match[3]);
}

// First match wins
const SHAPES: [TokenKind, (value: string) => boolean][] = [
  ['keyword', (v) => KEYWORDS.has(v)],
  ['fromTime', (v) => /^FM\d{6}$/.test(v)],
  ['probability', (v) => /^PROB\d{2}$/.test(v)],
  ['period', (v) => /^\d{4}\/\d{4}$/.test(v)],
  ['dayTime', (v) => /^\d{6}Z$/.test(v)],
  ['windShear', (v) => /^WS\d/.test(v)],
  ['temperatureForecast', (v) => /^T[XN]M?\d/.test(v)],
  ['pressureForecast', (v) => v.startsWith('QNH')],
  ['wind', (v) => /(KT|MPS|KMH)$/.test(v)],
  ['windVariation', (v) => /^\d{3}V\d{3}$/.test(v)],
  ['visibility', (v) => /^(\d{4}(NDV)?|[PM]?\d+(\/\d+)?SM|\d+\+)$/.test(v)],
  ['number', (v) => /^\d{1,2}$/.test(v)],
  ['rvr', (v) => /^R\d{2}[LCR]?\//.test(v)],
  ['temperature', (v) => /^M?[\d/]{1,2}\/(M?[\d/]{0,2})$/.test(v)],
  ['altimeter', (v) => /^[QA][\d/]{4}$/.test(v)],
  ['cloud', (v) => /^(FEW|SCT|BKN|OVC|VV)/.test(v)],
  ['weather', isWeatherGroup],
  ['station', (v) => STATION_PATTERN.test(v)],
];

export function classifyToken(value: string): TokenKind {
  for (const [kind, matches] of SHAPES) {
    if (matches(value)) return kind;
  }
  return 'unknown';
}

export function scanReport(raw: string): Token[] {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    throw new EmptyInputError();
  }

  return trimmed.split(/\s+/).map((text, index) => {
    const value = text.endsWith('=') && text.length > 1 ? text.slice(0, -1) : text;
    return { text, value, kind: classifyToken(value), index };
  });
}
