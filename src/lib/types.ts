// Four uppercase letters; only obtainable through isStationId / parseStation
export type StationId = string & { readonly __brand: 'StationId' };

export interface UtcInstant {
  readonly day: number;    // 1-31
  readonly hour: number;   // 0-23
  readonly minute: number; // 0-59
}

export interface ValidityPeriod {
  readonly from: UtcInstant;
  readonly to: UtcInstant;
}

// FM groups only carry a start instant
export interface GroupPeriod {
  readonly from: UtcInstant;
  readonly to?: UtcInstant;
}

export type WindDirection = number | 'VRB';

export interface Wind {
  readonly direction: WindDirection; // degrees true, 0-360
  readonly speedKt: number;
  readonly gustKt?: number;
  readonly variableBetween?: readonly [number, number];
}

export type VisibilityQualifier = 'exact' | 'orMore' | 'lessThan';

export type Visibility =
  | { readonly kind: 'meters'; readonly meters: number; readonly qualifier: VisibilityQualifier }
  | {
      readonly kind: 'statuteMiles';
      readonly miles: number;
      readonly text: string; // encoded figure, e.g. "1 1/2"
      readonly qualifier: VisibilityQualifier;
    }
  | { readonly kind: 'cavok' };

export type CloudCoverage = 'FEW' | 'SCT' | 'BKN' | 'OVC' | 'VV';

export interface CloudLayer {
  readonly coverage: CloudCoverage;
  readonly heightFt: number | null; // null when encoded as ///
  readonly convective?: 'CB' | 'TCU';
}

export type SkyCondition = 'NSC' | 'SKC' | 'CLR' | 'NCD';

export type WeatherGroup =
  | {
      readonly kind: 'phenomena';
      readonly code: string;
      readonly intensity?: '-' | '+' | 'VC';
      readonly descriptor?: string;
      readonly phenomena: readonly string[];
    }
  | { readonly kind: 'nsw' };

export interface TemperatureDewpoint {
  readonly temperatureC: number;
  readonly dewpointC: number;
}

export type Altimeter =
  | { readonly unit: 'hPa'; readonly value: number }
  | { readonly unit: 'inHg'; readonly value: number };

export interface WindShear {
  readonly heightFt: number;
  readonly wind: Wind;
}

export interface FieldIssue {
  readonly field: string;
  readonly token: string;
  readonly message: string;
}

export type MetarReportType = 'METAR' | 'SPECI';

export interface MetarRecord {
  readonly reportType: MetarReportType;
  readonly modifier?: 'AUTO' | 'COR';
  readonly station: StationId;
  readonly observationTime: UtcInstant;
  readonly receiptTime?: string;
  readonly wind?: Wind;
  readonly visibility?: Visibility;
  readonly weather: readonly WeatherGroup[];
  readonly cloudLayers: readonly CloudLayer[];
  readonly skyCondition?: SkyCondition;
  readonly temperatureDewpoint?: TemperatureDewpoint;
  readonly altimeter?: Altimeter;
  readonly trend?: string;
  readonly remarks?: string;
  readonly unparsedTokens: readonly string[];
  readonly issues: readonly FieldIssue[];
  readonly rawText: string;
}

// Absent or empty fields mean "unchanged from the base forecast"
export interface ForecastConditions {
  readonly wind?: Wind;
  readonly visibility?: Visibility;
  readonly weather: readonly WeatherGroup[];
  readonly cloudLayers: readonly CloudLayer[];
  readonly skyCondition?: SkyCondition;
  readonly windShear?: WindShear;
  readonly unparsedTokens: readonly string[];
}

export type ChangeGroupKind = 'FROM' | 'BECOMING' | 'TEMPORARY' | 'PROBABLE_TEMPORARY';

export interface ForecastChangeGroup {
  readonly kind: ChangeGroupKind;
  readonly probabilityPercent?: 30 | 40;
  readonly period?: GroupPeriod;
  readonly conditions: ForecastConditions;
}

export interface TafFlags {
  readonly amended: boolean;
  readonly corrected: boolean;
  readonly automated: boolean;
  readonly nil: boolean;
  readonly amendmentsNotScheduled: boolean;
}

export interface TemperatureForecast {
  readonly kind: 'max' | 'min';
  readonly temperatureC: number;
  readonly at: UtcInstant;
}

export interface TafRecord {
  readonly station: StationId;
  readonly flags: TafFlags;
  readonly issueTime: UtcInstant;
  readonly receiptTime?: string;
  readonly validity: ValidityPeriod;
  readonly baseForecast: ForecastConditions;
  readonly changeGroups: readonly ForecastChangeGroup[];
  readonly temperatureForecasts: readonly TemperatureForecast[];
  readonly pressureForecasts: readonly Altimeter[];
  readonly remarks?: string;
  readonly issues: readonly FieldIssue[];
  readonly rawText: string;
}

export interface ParseOptions {
  receiptTime?: string;
}

// Aviation Weather Center data API (format=json&taf=true), fields we read;
// anything else in an entry is dropped
export interface AwcMetarEntry {
  icaoId: string;
  receiptTime?: string;
  rawOb?: string;
  rawTaf?: string;
  name?: string;
}
