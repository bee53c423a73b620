import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getStationReports } from './actions';

const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('getStationReports', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('requests METARs with their TAFs and keeps the latest entry per station', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse([
        {
          icaoId: 'EGMC',
          name: 'Southend',
          receiptTime: '2024-05-20T16:52:00Z',
          obsTime: 1716223800,
          rawOb: 'METAR EGMC 201650Z 31009KT 9999 BKN019 03/M00 Q1014',
          rawTaf: 'TAF EGMC 201701Z 2018/2102 32012KT 9999 BKN018',
        },
        { icaoId: 'EGMC', rawOb: 'METAR EGMC 201620Z 31008KT 9999 BKN020 03/M00 Q1014' },
        { icaoId: 'egll', rawOb: 'METAR EGLL 201650Z 27010KT CAVOK 12/05 Q1020' },
        { name: 'no id' },
      ])
    );

    const result = await getStationReports(['egmc', 'EGLL']);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://aviationweather.gov/api/data/metar?ids=EGMC,EGLL&format=json&taf=true'
    );
    expect(fetchMock.mock.calls[0][1]).toMatchObject({
      headers: { 'User-Agent': 'metar-taf-decoder/1.0' },
      cache: 'no-store',
    });
    expect(result).toEqual({
      EGMC: {
        icaoId: 'EGMC',
        name: 'Southend',
        receiptTime: '2024-05-20T16:52:00Z',
        rawOb: 'METAR EGMC 201650Z 31009KT 9999 BKN019 03/M00 Q1014',
        rawTaf: 'TAF EGMC 201701Z 2018/2102 32012KT 9999 BKN018',
      },
      EGLL: { icaoId: 'EGLL', rawOb: 'METAR EGLL 201650Z 27010KT CAVOK 12/05 Q1020' },
    });
  });

  it('reads the endpoint and user agent from the environment', async () => {
    vi.stubEnv('AVIATION_WEATHER_API_URL', 'http://localhost:8080/data/');
    vi.stubEnv('AVIATION_WEATHER_USER_AGENT', 'test-agent');
    fetchMock.mockResolvedValue(jsonResponse([]));

    await expect(getStationReports(['EGMC'])).resolves.toEqual({});
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:8080/data/metar?ids=EGMC&format=json&taf=true');
    expect(fetchMock.mock.calls[0][1]).toMatchObject({ headers: { 'User-Agent': 'test-agent' } });
  });

  it('returns null when the API answers with an error status', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: 'unavailable' }, 503));
    await expect(getStationReports(['EGMC'])).resolves.toBeNull();
    expect(console.error).toHaveBeenCalledWith('Aviation Weather API returned 503 for EGMC');
  });

  it('returns null once retries are exhausted', async () => {
    vi.stubEnv('REPORT_FETCH_RETRIES', '1');
    fetchMock.mockRejectedValue(new Error('connection refused'));
    await expect(getStationReports(['EGMC'])).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries a failed request', async () => {
    vi.stubEnv('REPORT_FETCH_RETRIES', '2');
    fetchMock
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockResolvedValueOnce(jsonResponse([{ icaoId: 'EGMC', rawOb: 'METAR EGMC 201650Z 31009KT' }]));

    const result = await getStationReports(['EGMC']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ EGMC: { icaoId: 'EGMC', rawOb: 'METAR EGMC 201650Z 31009KT' } });
  });

  it('skips the request when no station is asked for', async () => {
    await expect(getStationReports([])).resolves.toEqual({});
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
