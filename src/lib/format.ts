import { formatClock, formatGroupPeriod, formatInstant, ordinalLabel } from './time';
import type {
  Altimeter,
  ChangeGroupKind,
  CloudCoverage,
  CloudLayer,
  FieldIssue,
  ForecastChangeGroup,
  ForecastConditions,
  MetarRecord,
  SkyCondition,
  TafFlags,
  TafRecord,
  TemperatureForecast,
  Visibility,
  WeatherGroup,
  Wind,
  WindShear,
} from './types';

const NOT_REPORTED = 'not reported';

const COVERAGE_WORDS: Record<CloudCoverage, string> = {
  FEW: 'Few',
  SCT: 'Scattered',
  BKN: 'Broken',
  OVC: 'Overcast',
  VV: 'Vertical Visibility',
};

const SKY_WORDS: Record<SkyCondition, string> = {
  NSC: 'No Significant Cloud',
  SKC: 'Sky Clear',
  CLR: 'Clear Below 12000 feet',
  NCD: 'No Cloud Detected',
};

const CONVECTIVE_WORDS = {
  CB: 'Cumulonimbus',
  TCU: 'Towering Cumulus',
} as const;

const WEATHER_WORDS: Record<string, string> = {
  '-': 'Light',
  '+': 'Heavy',
  VC: 'In the vicinity',
  MI: 'Shallow',
  BC: 'Patches',
  PR: 'Partial',
  DR: 'Drifting',
  BL: 'Blowing',
  SH: 'Showers',
  TS: 'Thunderstorm',
  FZ: 'Freezing',
  DZ: 'Drizzle',
  RA: 'Rain',
  SN: 'Snow',
  SG: 'Snow Grains',
  IC: 'Ice Crystals',
  PL: 'Ice Pellets',
  GR: 'Hail',
  GS: 'Small Hail/Snow Pellets',
  UP: 'Unknown Precipitation',
  BR: 'Mist',
  FG: 'Fog',
  FU: 'Smoke',
  VA: 'Volcanic Ash',
  DU: 'Dust',
  SA: 'Sand',
  HZ: 'Haze',
  PY: 'Spray',
  PO: 'Dust Whirls',
  SQ: 'Squall',
  FC: 'Funnel Cloud',
  SS: 'Sandstorm',
  DS: 'Duststorm',
};

const KIND_LABELS: Record<ChangeGroupKind, string> = {
  FROM: 'FROM',
  BECOMING: 'BECOMING',
  TEMPORARY: 'TEMPORARY',
  PROBABLE_TEMPORARY: 'TEMPORARY',
};

const describeCode = (code: string) => WEATHER_WORDS[code] ?? code;

const degrees = (value: number) => `${value.toString().padStart(3, '0')}°`;

export function describeWind(wind: Wind): string {
  if (wind.direction === 0 && wind.speedKt === 0) return 'Calm';

  let text =
    wind.direction === 'VRB'
      ? `Variable at ${wind.speedKt} KT`
      : `${degrees(wind.direction)} at ${wind.speedKt} KT`;
  if (wind.gustKt !== undefined) text += ` gusting to ${wind.gustKt} KT`;
  if (wind.variableBetween) {
    const [from, to] = wind.variableBetween;
    text += ` (varying between ${degrees(from)} and ${degrees(to)})`;
  }
  return text;
}

export function describeVisibility(visibility: Visibility): string {
  switch (visibility.kind) {
    case 'cavok':
      return 'CAVOK (ceiling and visibility OK)';
    case 'meters':
      if (visibility.meters === 9999) return '9999 meters (10 km or more)';
      return `${visibility.meters} meters`;
    case 'statuteMiles':
      if (visibility.qualifier === 'orMore') return `${visibility.text} SM or more`;
      if (visibility.qualifier === 'lessThan') return `less than ${visibility.text} SM`;
      return `${visibility.text} SM`;
  }
}

export function describeWeather(group: WeatherGroup): string {
  if (group.kind === 'nsw') return 'No Significant Weather';
  const parts = [
    ...(group.intensity ? [describeCode(group.intensity)] : []),
    ...(group.descriptor ? [describeCode(group.descriptor)] : []),
    ...group.phenomena.map(describeCode),
  ];
  return parts.join(' ');
}

export function describeCloud(layer: CloudLayer): string {
  const height = layer.heightFt === null ? 'unknown height' : `${layer.heightFt} feet`;
  const convective = layer.convective ? ` (${CONVECTIVE_WORDS[layer.convective]})` : '';
  return `${COVERAGE_WORDS[layer.coverage]} at ${height}${convective}`;
}

export function describeAltimeter(altimeter: Altimeter): string {
  return altimeter.unit === 'hPa' ? `${altimeter.value} hPa` : `${altimeter.value.toFixed(2)} inHg`;
}

function describeWindShear(shear: WindShear): string {
  return `at ${shear.heightFt} feet, ${describeWind(shear.wind)}`;
}

function describeTemperatureForecast(forecast: TemperatureForecast): string {
  const label = forecast.kind === 'max' ? 'Max Temperature' : 'Min Temperature';
  return `${label}: ${forecast.temperatureC}°C at ${formatInstant(forecast.at)}`;
}

function describeFlags(flags: TafFlags): string[] {
  return [
    ...(flags.amended ? ['Amended'] : []),
    ...(flags.corrected ? ['Corrected'] : []),
    ...(flags.automated ? ['Automated'] : []),
    ...(flags.amendmentsNotScheduled ? ['Amendments not scheduled'] : []),
  ];
}

function issueLines(issues: readonly FieldIssue[], rawText: string): string[] {
  if (issues.length === 0) return [];
  return [
    ...issues.map((issue) => `Could not decode ${issue.field} group "${issue.token}": ${issue.message}`),
    `Raw: ${rawText}`,
  ];
}

interface ConditionOptions {
  indent: string;
  // Render "Wind: not reported" instead of omitting an unset wind
  windPlaceholder: boolean;
}

function conditionLines(conditions: ForecastConditions, { indent, windPlaceholder }: ConditionOptions): string[] {
  const lines: string[] = [];
  if (conditions.wind) lines.push(`Wind: ${describeWind(conditions.wind)}`);
  else if (windPlaceholder) lines.push(`Wind: ${NOT_REPORTED}`);
  if (conditions.visibility) lines.push(`Visibility: ${describeVisibility(conditions.visibility)}`);
  if (conditions.weather.length > 0) lines.push(`Weather: ${conditions.weather.map(describeWeather).join(', ')}`);
  for (const layer of conditions.cloudLayers) lines.push(`Cloud: ${describeCloud(layer)}`);
  if (conditions.skyCondition) lines.push(`Cloud: ${SKY_WORDS[conditions.skyCondition]}`);
  if (conditions.windShear) lines.push(`Wind Shear: ${describeWindShear(conditions.windShear)}`);
  if (conditions.unparsedTokens.length > 0) lines.push(`Unparsed Groups: ${conditions.unparsedTokens.join(' ')}`);
  return lines.map((line) => indent + line);
}

export function formatMetarLines(record: MetarRecord): string[] {
  const lines = [`Report Type: ${record.reportType}`];
  if (record.modifier) lines.push(`Report Modifier: ${record.modifier === 'AUTO' ? 'Automated' : 'Corrected'}`);
  lines.push(
    `Station: ${record.station}`,
    `Observation Day: ${ordinalLabel(record.observationTime.day)}`,
    `Observation Time: ${formatClock(record.observationTime)}`,
    ...conditionLines(
      {
        wind: record.wind,
        visibility: record.visibility,
        weather: record.weather,
        cloudLayers: record.cloudLayers,
        skyCondition: record.skyCondition,
        unparsedTokens: [],
      },
      { indent: '', windPlaceholder: true }
    )
  );

  const { temperatureDewpoint, altimeter } = record;
  lines.push(
    temperatureDewpoint
      ? `Temperature/Dewpoint: ${temperatureDewpoint.temperatureC}°C / ${temperatureDewpoint.dewpointC}°C`
      : `Temperature/Dewpoint: ${NOT_REPORTED}`
  );
  if (altimeter) lines.push(`Altimeter: ${describeAltimeter(altimeter)}`);
  if (record.trend) lines.push(`Trend: ${record.trend}`);
  if (record.remarks) lines.push(`Remarks: ${record.remarks}`);
  if (record.unparsedTokens.length > 0) lines.push(`Unparsed Groups: ${record.unparsedTokens.join(' ')}`);
  lines.push(...issueLines(record.issues, record.rawText));
  return lines;
}

function changeGroupHeader(group: ForecastChangeGroup, position: number): string {
  const probability = group.probabilityPercent ? `PROB${group.probabilityPercent} ` : '';
  return `${position}. ${probability}${KIND_LABELS[group.kind]} ${formatGroupPeriod(group.period)}:`;
}

export function formatTafLines(record: TafRecord): string[] {
  const lines = [`Station: ${record.station}`];
  const flags = describeFlags(record.flags);
  if (flags.length > 0) lines.push(`Status: ${flags.join(', ')}`);
  lines.push(
    `Issue Date: ${ordinalLabel(record.issueTime.day)}`,
    `Issue Time: ${formatClock(record.issueTime)}`,
    `Valid From: ${formatInstant(record.validity.from)}`,
    `Valid To: ${formatInstant(record.validity.to)}`
  );

  if (record.flags.nil) {
    lines.push('Forecast: NIL (not available)');
  } else {
    lines.push('BASE FORECAST:', ...conditionLines(record.baseForecast, { indent: '  ', windPlaceholder: true }));
  }

  if (record.changeGroups.length > 0) {
    lines.push('FORECAST CHANGES:');
    record.changeGroups.forEach((group, i) => {
      lines.push(
        `  ${changeGroupHeader(group, i + 1)}`,
        ...conditionLines(group.conditions, { indent: '    ', windPlaceholder: false })
      );
    });
  }

  lines.push(...record.temperatureForecasts.map(describeTemperatureForecast));
  lines.push(...record.pressureForecasts.map((pressure) => `Pressure Forecast: ${describeAltimeter(pressure)}`));
  if (record.remarks) lines.push(`Remarks: ${record.remarks}`);
  lines.push(...issueLines(record.issues, record.rawText));
  return lines;
}

export function formatReport(record: MetarRecord | TafRecord, eol = '\n'): string {
  const lines = 'validity' in record ? formatTafLines(record) : formatMetarLines(record);
  return lines.join(eol);
}
