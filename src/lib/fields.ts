import { MalformedFieldError, MalformedTimeError, MissingStationError } from './errors';
import { parseDayHour } from './time';
import { STATION_PATTERN, type Token, WEATHER_PATTERN } from './tokens';
import type {
  Altimeter,
  CloudCoverage,
  CloudLayer,
  FieldIssue,
  ForecastConditions,
  SkyCondition,
  StationId,
  TemperatureDewpoint,
  TemperatureForecast,
  Visibility,
  WeatherGroup,
  Wind,
  WindShear,
} from './types';

// Field sub-grammar shared by the METAR parser, the TAF base forecast and
// every TAF change group.

export type FieldResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: MalformedFieldError };

const ok = <T>(value: T): FieldResult<T> => ({ ok: true, value });
const fail = <T>(field: string, token: string, reason: string): FieldResult<T> => ({
  ok: false,
  error: new MalformedFieldError(field, token, reason),
});

const KNOTS_PER_MPS = 1.94384;
const KNOTS_PER_KMH = 0.539957;

// "M" marks a negative value; M00 is plain zero
function signedValue(minus: string, digits: string): number {
  const value = parseInt(digits, 10);
  return minus === 'M' && value !== 0 ? -value : value;
}

export function isStationId(value: string): value is StationId {
  return STATION_PATTERN.test(value);
}

export function parseStation(token: string | undefined): StationId {
  if (token === undefined || !isStationId(token)) {
    throw new MissingStationError(token);
  }
  return token;
}

function toKnots(value: number, unit: string): number {
  if (unit === 'MPS') return Math.round(value * KNOTS_PER_MPS);
  if (unit === 'KMH') return Math.round(value * KNOTS_PER_KMH);
  return value;
}

function windFromParts(
  field: string,
  token: string,
  direction: string,
  speed: string,
  gust: string | undefined,
  unit: string
): FieldResult<Wind> {
  const degrees = direction === 'VRB' ? 'VRB' : parseInt(direction, 10);
  if (degrees !== 'VRB' && degrees > 360) {
    return fail(field, token, `direction ${degrees} is outside 0-360`);
  }

  const wind: Wind = {
    direction: degrees,
    speedKt: toKnots(parseInt(speed, 10), unit),
    ...(gust ? { gustKt: toKnots(parseInt(gust, 10), unit) } : {}),
  };
  return ok(wind);
}

// dddff[Gfff]KT, VRBffKT; MPS and KMH are converted to knots
export function parseWind(token: string): FieldResult<Wind> {
  const match = token.match(/^(\d{3}|VRB)(\d{2,3})(?:G(\d{2,3}))?(KT|MPS|KMH)$/);
  if (!match) {
    return fail('wind', token, 'expected dddff[Gff]KT or VRBffKT');
  }
  return windFromParts('wind', token, match[1], match[2], match[3], match[4]);
}

// dddVddd
export function parseWindVariation(token: string): FieldResult<readonly [number, number]> {
  const match = token.match(/^(\d{3})V(\d{3})$/);
  if (!match) {
    return fail('wind', token, 'expected dddVddd');
  }
  const from = parseInt(match[1], 10);
  const to = parseInt(match[2], 10);
  if (from > 360 || to > 360) {
    return fail('wind', token, 'variation bounds must be within 0-360');
  }
  return ok([from, to] as const);
}

// WShhh/dddffKT
export function parseWindShear(token: string): FieldResult<WindShear> {
  const match = token.match(/^WS(\d{3})\/(\d{3})(\d{2,3})(?:G(\d{2,3}))?(KT|MPS|KMH)$/);
  if (!match) {
    return fail('windShear', token, 'expected WShhh/dddffKT');
  }
  const wind = windFromParts('windShear', token, match[2], match[3], match[4], match[5]);
  if (!wind.ok) return wind;
  return ok<WindShear>({ heightFt: parseInt(match[1], 10) * 100, wind: wind.value });
}

function parseFraction(text: string): number | null {
  const parts = text.split('/').map((part) => parseInt(part, 10));
  if (parts.length === 1) return parts[0];
  if (parts[1] === 0) return null;
  return parts[0] / parts[1];
}

/**
 * Visibility may span two tokens ("1 1/2SM"), so this reads from the token
 * list and reports how many tokens it took. Returns null when the token at
 * `index` does not start a visibility group.
 */
export function parseVisibility(
  tokens: readonly Token[],
  index: number
): { taken: number; result: FieldResult<Visibility> } | null {
  const token = tokens[index];
  const next = tokens[index + 1];

  if (token.kind === 'keyword' && token.value === 'CAVOK') {
    return { taken: 1, result: ok<Visibility>({ kind: 'cavok' }) };
  }

  if (token.kind === 'number') {
    const fraction = next?.value.match(/^(\d+\/\d+)SM$/);
    if (!fraction) return null;
    const part = parseFraction(fraction[1]);
    if (part === null) {
      return { taken: 2, result: fail('visibility', `${token.value} ${next.value}`, 'zero denominator') };
    }
    return {
      taken: 2,
      result: ok<Visibility>({
        kind: 'statuteMiles',
        miles: parseInt(token.value, 10) + part,
        text: `${token.value} ${fraction[1]}`,
        qualifier: 'exact',
      }),
    };
  }

  if (token.kind !== 'visibility') return null;
  const value = token.value;

  const meters = value.match(/^(\d{4})(NDV)?$/);
  if (meters) {
    const distance = parseInt(meters[1], 10);
    return {
      taken: 1,
      result: ok<Visibility>({ kind: 'meters', meters: distance, qualifier: distance === 9999 ? 'orMore' : 'exact' }),
    };
  }

  const miles = value.match(/^([PM])?(\d+(?:\/\d+)?)SM$/);
  if (miles) {
    const distance = parseFraction(miles[2]);
    if (distance === null) {
      return { taken: 1, result: fail('visibility', value, 'zero denominator') };
    }
    return {
      taken: 1,
      result: ok<Visibility>({
        kind: 'statuteMiles',
        miles: distance,
        text: miles[2],
        qualifier: miles[1] === 'P' ? 'orMore' : miles[1] === 'M' ? 'lessThan' : 'exact',
      }),
    };
  }

  const openEnded = value.match(/^(\d+)\+$/);
  if (openEnded) {
    return {
      taken: 1,
      result: ok<Visibility>({ kind: 'statuteMiles', miles: parseInt(openEnded[1], 10), text: openEnded[1], qualifier: 'orMore' }),
    };
  }

  return { taken: 1, result: fail('visibility', value, 'unrecognized visibility group') };
}

const CLOUD_COVERAGES: Record<string, CloudCoverage> = {
  FEW: 'FEW',
  SCT: 'SCT',
  BKN: 'BKN',
  OVC: 'OVC',
  VV: 'VV',
};

// FEW|SCT|BKN|OVC|VV + hhh (hundreds of feet) or ///, optional CB/TCU
export function parseCloud(token: string): FieldResult<CloudLayer> {
  const match = token.match(/^(FEW|SCT|BKN|OVC|VV)(\d{3}|\/\/\/)(CB|TCU|\/\/\/)?$/);
  if (!match) {
    return fail('clouds', token, 'expected coverage followed by a three-digit height');
  }

  const [, coverage, height, convective] = match;
  const layer: CloudLayer = {
    coverage: CLOUD_COVERAGES[coverage],
    heightFt: height === '///' ? null : parseInt(height, 10) * 100,
    ...(convective === 'CB' || convective === 'TCU' ? { convective } : {}),
  };
  return ok(layer);
}

export function parseWeather(token: string): FieldResult<WeatherGroup> {
  if (token === 'NSW') return ok<WeatherGroup>({ kind: 'nsw' });

  const match = token.match(WEATHER_PATTERN);
  if (!match || !(match[2] || match[3])) {
    return fail('weather', token, 'unrecognized present-weather group');
  }

  const [, intensity, descriptor, phenomena] = match;
  return ok<WeatherGroup>({
    kind: 'phenomena',
    code: token,
    ...(intensity === '-' || intensity === '+' || intensity === 'VC' ? { intensity } : {}),
    ...(descriptor ? { descriptor } : {}),
    phenomena: phenomena.match(/.{2}/g) ?? [],
  });
}

// TT/DD with M for negatives
export function parseTemperature(token: string): FieldResult<TemperatureDewpoint> {
  const match = token.match(/^(M?)(\d{2})\/(M?)(\d{2})$/);
  if (!match) {
    return fail('temperatureDewpoint', token, 'expected TT/DD');
  }
  return ok<TemperatureDewpoint>({
    temperatureC: signedValue(match[1], match[2]),
    dewpointC: signedValue(match[3], match[4]),
  });
}

// Qpppp hectopascals, Apppp hundredths of inches of mercury
export function parseAltimeter(token: string): FieldResult<Altimeter> {
  const match = token.match(/^([QA])(\d{4})$/);
  if (!match) {
    return fail('altimeter', token, 'expected Qpppp or Apppp');
  }
  const digits = parseInt(match[2], 10);
  return ok<Altimeter>(match[1] === 'Q' ? { unit: 'hPa', value: digits } : { unit: 'inHg', value: digits / 100 });
}

// QNHppppINS
export function parsePressureForecast(token: string): FieldResult<Altimeter> {
  const match = token.match(/^QNH(\d{4})INS$/);
  if (!match) {
    return fail('pressureForecast', token, 'expected QNHppppINS');
  }
  return ok<Altimeter>({ unit: 'inHg', value: parseInt(match[1], 10) / 100 });
}

// TXtt/DDHHZ, TNtt/DDHHZ
export function parseTemperatureForecast(token: string): FieldResult<TemperatureForecast> {
  const match = token.match(/^T([XN])(M?)(\d{2})\/(\d{4})Z$/);
  if (!match) {
    return fail('temperatureForecast', token, 'expected TXtt/DDHHZ or TNtt/DDHHZ');
  }
  try {
    return ok<TemperatureForecast>({
      kind: match[1] === 'X' ? 'max' : 'min',
      temperatureC: signedValue(match[2], match[3]),
      at: parseDayHour(match[4], token),
    });
  } catch (error) {
    if (error instanceof MalformedTimeError) {
      return fail('temperatureForecast', token, error.message);
    }
    throw error;
  }
}

const SKY_CONDITIONS: Record<string, SkyCondition> = {
  NSC: 'NSC',
  SKC: 'SKC',
  CLR: 'CLR',
  NCD: 'NCD',
};

/**
 * Collects wind, visibility, weather and cloud groups for one forecast
 * block (or the body of a METAR). Malformed groups are reported to the
 * shared issue list and leave the field unset; a repeated group keeps the
 * first occurrence and the repeat is kept as an unparsed token.
 */
export class ConditionsBuilder {
  private wind?: Wind;
  private visibility?: Visibility;
  private readonly weather: WeatherGroup[] = [];
  private readonly cloudLayers: CloudLayer[] = [];
  private skyCondition?: SkyCondition;
  private windShear?: WindShear;
  private readonly unparsedTokens: string[] = [];

  constructor(private readonly issues: FieldIssue[]) {}

  report(error: MalformedFieldError): void {
    this.issues.push(error.toIssue());
  }

  addUnparsed(text: string): void {
    this.unparsedTokens.push(text);
  }

  // Returns the number of tokens taken; 0 when tokens[index] is not a conditions group
  consume(tokens: readonly Token[], index: number): number {
    const token = tokens[index];

    switch (token.kind) {
      case 'wind':
        return this.consumeWind(tokens, index);

      case 'windVariation':
        this.report(new MalformedFieldError('wind', token.value, 'variation group without a preceding wind group'));
        return 1;

      case 'windShear': {
        const result = parseWindShear(token.value);
        if (!result.ok) this.report(result.error);
        else if (this.windShear) this.addUnparsed(token.text);
        else this.windShear = result.value;
        return 1;
      }

      case 'cloud': {
        const result = parseCloud(token.value);
        if (result.ok) this.cloudLayers.push(result.value);
        else this.report(result.error);
        return 1;
      }

      case 'weather': {
        const result = parseWeather(token.value);
        if (result.ok) this.weather.push(result.value);
        else this.report(result.error);
        return 1;
      }

      case 'keyword':
        if (token.value === 'NSW') {
          this.weather.push({ kind: 'nsw' });
          return 1;
        }
        if (token.value in SKY_CONDITIONS) {
          this.skyCondition ??= SKY_CONDITIONS[token.value];
          return 1;
        }
        if (token.value === 'CAVOK') return this.consumeVisibility(tokens, index);
        return 0;

      case 'number':
      case 'visibility':
        return this.consumeVisibility(tokens, index);

      default:
        return 0;
    }
  }

  private consumeWind(tokens: readonly Token[], index: number): number {
    const token = tokens[index];
    const next = tokens[index + 1];
    const taken = next?.kind === 'windVariation' ? 2 : 1;

    const result = parseWind(token.value);
    if (!result.ok) {
      this.report(result.error);
      return taken;
    }

    let wind = result.value;
    if (taken === 2) {
      const variation = parseWindVariation(next.value);
      if (variation.ok) wind = { ...wind, variableBetween: variation.value };
      else this.report(variation.error);
    }

    if (wind.gustKt !== undefined && wind.gustKt <= wind.speedKt) {
      this.report(
        new MalformedFieldError('wind', token.value, `gust ${wind.gustKt} KT is not greater than speed ${wind.speedKt} KT`)
      );
    }

    if (this.wind) {
      this.addUnparsed(token.text);
      if (taken === 2) this.addUnparsed(next.text);
    } else {
      this.wind = wind;
    }
    return taken;
  }

  private consumeVisibility(tokens: readonly Token[], index: number): number {
    const parsed = parseVisibility(tokens, index);
    if (!parsed) return 0;

    if (!parsed.result.ok) {
      this.report(parsed.result.error);
    } else if (this.visibility) {
      tokens.slice(index, index + parsed.taken).forEach((t) => this.addUnparsed(t.text));
    } else {
      this.visibility = parsed.result.value;
    }
    return parsed.taken;
  }

  build(): ForecastConditions {
    return {
      ...(this.wind ? { wind: this.wind } : {}),
      ...(this.visibility ? { visibility: this.visibility } : {}),
      weather: [...this.weather],
      cloudLayers: [...this.cloudLayers],
      ...(this.skyCondition ? { skyCondition: this.skyCondition } : {}),
      ...(this.windShear ? { windShear: this.windShear } : {}),
      unparsedTokens: [...this.unparsedTokens],
    };
  }
}
