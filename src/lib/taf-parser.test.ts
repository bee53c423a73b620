import { describe, expect, it } from 'vitest';
import { EmptyInputError, MalformedTimeError, MissingStationError, MissingTimeError } from './errors';
import { parseTaf } from './taf-parser';
import { formatGroupPeriod } from './time';

const SAMPLE =
  'TAF EGMC 201701Z 2018/2102 32012KT 9999 BKN018 PROB30 TEMPO 2018/2020 BKN014 TEMPO 2020/2102 BKN012';

describe('parseTaf', () => {
  it('decodes the header and base forecast', () => {
    const record = parseTaf(SAMPLE);
    expect(record.station).toBe('EGMC');
    expect(record.issueTime).toEqual({ day: 20, hour: 17, minute: 1 });
    expect(record.validity).toEqual({
      from: { day: 20, hour: 18, minute: 0 },
      to: { day: 21, hour: 2, minute: 0 },
    });
    expect(record.baseForecast).toEqual({
      wind: { direction: 320, speedKt: 12 },
      visibility: { kind: 'meters', meters: 9999, qualifier: 'orMore' },
      weather: [],
      cloudLayers: [{ coverage: 'BKN', heightFt: 1800 }],
      unparsedTokens: [],
    });
    expect(record.issues).toEqual([]);
  });

  it('opens one change group per introducer, each with its own period', () => {
    const record = parseTaf(SAMPLE);
    expect(record.changeGroups).toEqual([
      {
        kind: 'PROBABLE_TEMPORARY',
        probabilityPercent: 30,
        period: { from: { day: 20, hour: 18, minute: 0 }, to: { day: 20, hour: 20, minute: 0 } },
        conditions: { weather: [], cloudLayers: [{ coverage: 'BKN', heightFt: 1400 }], unparsedTokens: [] },
      },
      {
        kind: 'TEMPORARY',
        period: { from: { day: 20, hour: 20, minute: 0 }, to: { day: 21, hour: 2, minute: 0 } },
        conditions: { weather: [], cloudLayers: [{ coverage: 'BKN', heightFt: 1200 }], unparsedTokens: [] },
      },
    ]);
    expect(formatGroupPeriod(record.changeGroups[0].period)).toBe('18:00Z to 20:00Z');
  });

  it('keeps groups in encoding order', () => {
    const record = parseTaf(`${SAMPLE} BECMG 2100/2102 9000`);
    expect(record.changeGroups.map((group) => group.kind)).toEqual([
      'PROBABLE_TEMPORARY',
      'TEMPORARY',
      'BECOMING',
    ]);
    expect(record.changeGroups[2].conditions.visibility).toEqual({ kind: 'meters', meters: 9000, qualifier: 'exact' });
  });

  it('reads FM groups as a single instant', () => {
    const record = parseTaf(
      'TAF KJFK 201130Z 2012/2118 18010KT P6SM SCT040 FM201800 22015G25KT P6SM BKN035'
    );
    expect(record.changeGroups).toEqual([
      {
        kind: 'FROM',
        period: { from: { day: 20, hour: 18, minute: 0 } },
        conditions: {
          wind: { direction: 220, speedKt: 15, gustKt: 25 },
          visibility: { kind: 'statuteMiles', miles: 6, text: '6', qualifier: 'orMore' },
          weather: [],
          cloudLayers: [{ coverage: 'BKN', heightFt: 3500 }],
          unparsedTokens: [],
        },
      },
    ]);
  });

  it('reads PROB40 TEMPO', () => {
    const [group] = parseTaf('TAF EGMC 201701Z 2018/2102 32012KT PROB40 TEMPO 2018/2020 4000 RA').changeGroups;
    expect(group.kind).toBe('PROBABLE_TEMPORARY');
    expect(group.probabilityPercent).toBe(40);
    expect(group.conditions.visibility).toEqual({ kind: 'meters', meters: 4000, qualifier: 'exact' });
  });

  it('leaves PROB without TEMPO in the current group', () => {
    const record = parseTaf('TAF EGMC 201701Z 2018/2102 32012KT 9999 BKN018 PROB30 2018/2020 BKN010');
    expect(record.changeGroups).toEqual([]);
    expect(record.baseForecast.cloudLayers).toEqual([
      { coverage: 'BKN', heightFt: 1800 },
      { coverage: 'BKN', heightFt: 1000 },
    ]);
    expect(record.baseForecast.unparsedTokens).toEqual(['PROB30', '2018/2020']);
  });

  it('reports a malformed group period and leaves it unset', () => {
    const record = parseTaf('TAF EGMC 201701Z 2018/2102 32012KT TEMPO 2020/2018 BKN012');
    expect(record.changeGroups).toHaveLength(1);
    expect(record.changeGroups[0].period).toBeUndefined();
    expect(record.changeGroups[0].conditions.cloudLayers).toEqual([{ coverage: 'BKN', heightFt: 1200 }]);
    expect(record.issues).toEqual([
      {
        field: 'changeGroup',
        token: '2020/2018',
        message: 'Malformed time group "2020/2018": period ends before it starts',
      },
    ]);
  });

  it('reports a group period that runs back to an earlier day', () => {
    const record = parseTaf('TAF EGMC 201701Z 2018/2102 32012KT TEMPO 2018/1902 BKN012');
    expect(record.changeGroups[0].period).toBeUndefined();
    expect(record.issues).toEqual([
      {
        field: 'changeGroup',
        token: '2018/1902',
        message: 'Malformed time group "2018/1902": period ends before it starts',
      },
    ]);
  });

  it('accepts a change group with no period', () => {
    const record = parseTaf('TAF EGMC 201701Z 2018/2102 32012KT TEMPO BKN012');
    expect(record.changeGroups[0].period).toBeUndefined();
    expect(record.issues).toEqual([]);
  });

  it('reads header and trailing flags', () => {
    const record = parseTaf('TAF AMD EGMC 201701Z AUTO 2018/2102 32012KT 9999 BKN018 AMD NOT SKED');
    expect(record.flags).toEqual({
      amended: true,
      corrected: false,
      automated: true,
      nil: false,
      amendmentsNotScheduled: true,
    });
    expect(record.baseForecast.unparsedTokens).toEqual([]);
  });

  it('marks a NIL forecast', () => {
    const record = parseTaf('TAF EGMC 201701Z 2018/2102 NIL');
    expect(record.flags.nil).toBe(true);
    expect(record.baseForecast).toEqual({ weather: [], cloudLayers: [], unparsedTokens: [] });
  });

  it('collects temperature and pressure forecasts', () => {
    const record = parseTaf(
      'TAF EGMC 201701Z 2018/2102 32012KT 9999 BKN018 TX15/2018Z TN05/2102Z QNH2992INS RMK NXT FCST BY 00Z'
    );
    expect(record.temperatureForecasts).toEqual([
      { kind: 'max', temperatureC: 15, at: { day: 20, hour: 18, minute: 0 } },
      { kind: 'min', temperatureC: 5, at: { day: 21, hour: 2, minute: 0 } },
    ]);
    expect(record.pressureForecasts).toHaveLength(1);
    expect(record.pressureForecasts[0].value).toBeCloseTo(29.92);
    expect(record.remarks).toBe('NXT FCST BY 00Z');
  });

  it('reads wind shear in the base forecast', () => {
    const record = parseTaf('TAF KJFK 201130Z 2012/2118 18010KT P6SM SCT040 WS020/05065KT');
    expect(record.baseForecast.windShear).toEqual({ heightFt: 2000, wind: { direction: 50, speedKt: 65 } });
  });

  it('accepts a validity period across a month end', () => {
    expect(parseTaf('TAF EGMC 311700Z 3118/0106 32012KT').validity).toEqual({
      from: { day: 31, hour: 18, minute: 0 },
      to: { day: 1, hour: 6, minute: 0 },
    });
  });

  it('does not need the TAF keyword', () => {
    expect(parseTaf('EGMC 201701Z 2018/2102 32012KT').station).toBe('EGMC');
  });

  it('fails without a station, issue time or validity', () => {
    expect(() => parseTaf('TAF 201701Z 2018/2102')).toThrow(MissingStationError);
    expect(() => parseTaf('TAF EGMC 2018/2102 32012KT')).toThrow(MissingTimeError);
    expect(() => parseTaf('TAF EGMC 201701Z 32012KT')).toThrow(
      'Expected a validity period DDHH/DDHH, found "32012KT"'
    );
    expect(() => parseTaf('TAF EGMC 201701Z 2018/2016')).toThrow(MalformedTimeError);
    expect(() => parseTaf('TAF EGMC 201701Z 2018/1502 32012KT')).toThrow(
      'Malformed time group "2018/1502": period ends before it starts'
    );
    expect(() => parseTaf(' ')).toThrow(EmptyInputError);
  });
});
