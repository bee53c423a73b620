import { MissingTimeError } from './errors';
import { ConditionsBuilder, parseAltimeter, parseStation, parseTemperature } from './fields';
import { parseIssueTime } from './time';
import { scanReport, type Token } from './tokens';
import type { Altimeter, FieldIssue, MetarRecord, MetarReportType, ParseOptions, TemperatureDewpoint } from './types';

// METAR/SPECI parser
// Station and observation time are positional and mandatory. Everything
// after them is keyed on token shape, so optional groups (gusts, variable
// wind, several cloud layers, present weather) can shift freely.

const TREND_KEYWORDS = new Set(['NOSIG', 'BECMG', 'TEMPO']);

const joinText = (tokens: readonly Token[]) => tokens.map((t) => t.text).join(' ');

export function parseMetar(raw: string, options: ParseOptions = {}): MetarRecord {
  const tokens = scanReport(raw);
  const issues: FieldIssue[] = [];
  const conditions = new ConditionsBuilder(issues);
  let index = 0;

  let reportType: MetarReportType = 'METAR';
  let modifier: 'AUTO' | 'COR' | undefined;

  const first = tokens[0].value;
  if (first === 'METAR' || first === 'SPECI') {
    reportType = first;
    index++;
  }
  if (tokens[index]?.value === 'COR') {
    modifier = 'COR';
    index++;
  }

  const station = parseStation(tokens[index]?.value);
  index++;

  const timeToken = tokens[index];
  if (timeToken?.kind !== 'dayTime') {
    throw new MissingTimeError('an observation time DDHHMMZ', timeToken?.value);
  }
  const observationTime = parseIssueTime(timeToken.value.slice(0, -1), timeToken.value);
  index++;

  let temperatureDewpoint: TemperatureDewpoint | undefined;
  let altimeter: Altimeter | undefined;
  let trend: string | undefined;
  let remarks: string | undefined;

  while (index < tokens.length) {
    const token = tokens[index];

    if (token.value === 'RMK') {
      remarks = joinText(tokens.slice(index + 1));
      break;
    }

    if (TREND_KEYWORDS.has(token.value)) {
      const remarksAt = tokens.findIndex((t, i) => i > index && t.value === 'RMK');
      const end = remarksAt === -1 ? tokens.length : remarksAt;
      trend = joinText(tokens.slice(index, end));
      index = end;
      continue;
    }

    if (token.value === 'AUTO' || token.value === 'COR') {
      modifier ??= token.value;
      index++;
      continue;
    }

    if (token.kind === 'temperature') {
      const result = parseTemperature(token.value);
      if (!result.ok) conditions.report(result.error);
      else if (temperatureDewpoint) conditions.addUnparsed(token.text);
      else temperatureDewpoint = result.value;
      index++;
      continue;
    }

    if (token.kind === 'altimeter') {
      const result = parseAltimeter(token.value);
      if (!result.ok) conditions.report(result.error);
      else if (altimeter) conditions.addUnparsed(token.text);
      else altimeter = result.value;
      index++;
      continue;
    }

    const taken = conditions.consume(tokens, index);
    if (taken === 0) {
      conditions.addUnparsed(token.text);
      index++;
    } else {
      index += taken;
    }
  }

  const body = conditions.build();

  return {
    reportType,
    ...(modifier ? { modifier } : {}),
    station,
    observationTime,
    ...(options.receiptTime ? { receiptTime: options.receiptTime } : {}),
    ...(body.wind ? { wind: body.wind } : {}),
    ...(body.visibility ? { visibility: body.visibility } : {}),
    weather: body.weather,
    cloudLayers: body.cloudLayers,
    ...(body.skyCondition ? { skyCondition: body.skyCondition } : {}),
    ...(temperatureDewpoint ? { temperatureDewpoint } : {}),
    ...(altimeter ? { altimeter } : {}),
    ...(trend ? { trend } : {}),
    ...(remarks ? { remarks } : {}),
    unparsedTokens: body.unparsedTokens,
    issues,
    rawText: raw,
  };
}
