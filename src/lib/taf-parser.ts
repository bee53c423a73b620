import { MalformedFieldError, MalformedTimeError, MissingTimeError } from './errors';
import { ConditionsBuilder, parsePressureForecast, parseStation, parseTemperatureForecast } from './fields';
import { parseFromTime, parseIssueTime, parseValidityToken } from './time';
import { scanReport, type Token } from './tokens';
import type {
  Altimeter,
  ChangeGroupKind,
  FieldIssue,
  ForecastChangeGroup,
  GroupPeriod,
  ParseOptions,
  TafRecord,
  TemperatureForecast,
} from './types';

// TAF parser
// Header (station, issue time, validity) is positional; the body is a base
// forecast followed by change groups. Each FM/BECMG/TEMPO/PROBnn TEMPO
// introducer opens a new group that takes field groups until the next
// introducer, and the group keeps its own period.

interface Introducer {
  kind: ChangeGroupKind;
  probabilityPercent?: 30 | 40;
  period?: GroupPeriod;
  taken: number;
}

interface OpenGroup {
  introducer: Introducer;
  builder: ConditionsBuilder;
}

const joinText = (tokens: readonly Token[]) => tokens.map((t) => t.text).join(' ');

function periodIssue(error: MalformedTimeError): FieldIssue {
  return new MalformedFieldError('changeGroup', error.token, error.message).toIssue();
}

function readRangePeriod(token: Token | undefined, issues: FieldIssue[]): { period?: GroupPeriod; taken: number } {
  if (token?.kind !== 'period') return { taken: 0 };
  try {
    return { period: parseValidityToken(token.value), taken: 1 };
  } catch (error) {
    if (!(error instanceof MalformedTimeError)) throw error;
    issues.push(periodIssue(error));
    return { taken: 1 };
  }
}

function readIntroducer(tokens: readonly Token[], index: number, issues: FieldIssue[]): Introducer | null {
  const token = tokens[index];

  if (token.kind === 'fromTime') {
    try {
      return { kind: 'FROM', period: { from: parseFromTime(token.value) }, taken: 1 };
    } catch (error) {
      if (!(error instanceof MalformedTimeError)) throw error;
      issues.push(periodIssue(error));
      return { kind: 'FROM', taken: 1 };
    }
  }

  if (token.value === 'BECMG' || token.value === 'TEMPO') {
    const { period, taken } = readRangePeriod(tokens[index + 1], issues);
    return {
      kind: token.value === 'BECMG' ? 'BECOMING' : 'TEMPORARY',
      ...(period ? { period } : {}),
      taken: 1 + taken,
    };
  }

  // PROBnn only introduces a group when TEMPO follows directly
  if ((token.value === 'PROB30' || token.value === 'PROB40') && tokens[index + 1]?.value === 'TEMPO') {
    const { period, taken } = readRangePeriod(tokens[index + 2], issues);
    return {
      kind: 'PROBABLE_TEMPORARY',
      probabilityPercent: token.value === 'PROB30' ? 30 : 40,
      ...(period ? { period } : {}),
      taken: 2 + taken,
    };
  }

  return null;
}

export function parseTaf(raw: string, options: ParseOptions = {}): TafRecord {
  const tokens = scanReport(raw);
  const issues: FieldIssue[] = [];
  const flags = { amended: false, corrected: false, automated: false, nil: false, amendmentsNotScheduled: false };
  let index = 0;

  const readHeaderFlags = () => {
    for (;;) {
      const value = tokens[index]?.value;
      if (value === 'AMD') flags.amended = true;
      else if (value === 'COR') flags.corrected = true;
      else if (value === 'AUTO') flags.automated = true;
      else return;
      index++;
    }
  };

  // The TAF keyword is never the station
  if (tokens[0].value === 'TAF') index++;
  readHeaderFlags();

  const station = parseStation(tokens[index]?.value);
  index++;

  const issueToken = tokens[index];
  if (issueToken?.kind !== 'dayTime') {
    throw new MissingTimeError('an issue time DDHHMMZ', issueToken?.value);
  }
  const issueTime = parseIssueTime(issueToken.value.slice(0, -1), issueToken.value);
  index++;
  readHeaderFlags();

  const validityToken = tokens[index];
  if (validityToken?.kind !== 'period') {
    throw new MissingTimeError('a validity period DDHH/DDHH', validityToken?.value);
  }
  const validity = parseValidityToken(validityToken.value);
  index++;

  const base = new ConditionsBuilder(issues);
  const groups: OpenGroup[] = [];
  let current = base;
  const temperatureForecasts: TemperatureForecast[] = [];
  const pressureForecasts: Altimeter[] = [];
  let remarks: string | undefined;

  while (index < tokens.length) {
    const token = tokens[index];

    if (token.value === 'RMK') {
      remarks = joinText(tokens.slice(index + 1));
      break;
    }

    if (token.value === 'NIL') {
      flags.nil = true;
      index++;
      continue;
    }

    if (token.value === 'AMD' && tokens[index + 1]?.value === 'NOT' && tokens[index + 2]?.value === 'SKED') {
      flags.amendmentsNotScheduled = true;
      index += 3;
      continue;
    }

    const introducer = readIntroducer(tokens, index, issues);
    if (introducer) {
      current = new ConditionsBuilder(issues);
      groups.push({ introducer, builder: current });
      index += introducer.taken;
      continue;
    }

    if (token.kind === 'temperatureForecast') {
      const result = parseTemperatureForecast(token.value);
      if (result.ok) temperatureForecasts.push(result.value);
      else issues.push(result.error.toIssue());
      index++;
      continue;
    }

    if (token.kind === 'pressureForecast') {
      const result = parsePressureForecast(token.value);
      if (result.ok) pressureForecasts.push(result.value);
      else issues.push(result.error.toIssue());
      index++;
      continue;
    }

    const taken = current.consume(tokens, index);
    if (taken === 0) {
      current.addUnparsed(token.text);
      index++;
    } else {
      index += taken;
    }
  }

  const changeGroups: ForecastChangeGroup[] = groups.map(({ introducer, builder }) => ({
    kind: introducer.kind,
    ...(introducer.probabilityPercent ? { probabilityPercent: introducer.probabilityPercent } : {}),
    ...(introducer.period ? { period: introducer.period } : {}),
    conditions: builder.build(),
  }));

  return {
    station,
    flags,
    issueTime,
    ...(options.receiptTime ? { receiptTime: options.receiptTime } : {}),
    validity,
    baseForecast: base.build(),
    changeGroups,
    temperatureForecasts,
    pressureForecasts,
    ...(remarks ? { remarks } : {}),
    issues,
    rawText: raw,
  };
}
