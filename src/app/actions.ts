'use server';

import type { AwcMetarEntry } from '@/lib/types';

// Aviation Weather Center data API config
interface AviationWeatherConfig {
  apiUrl: string;
  userAgent: string;
  timeoutMs: number;
  retries: number;
}

const DEFAULT_API_URL = 'https://aviationweather.gov/api/data';
const DEFAULT_USER_AGENT = 'metar-taf-decoder/1.0';

// Fetch configuration
const FETCH_TIMEOUT_MS = 5000;
const MAX_RETRIES = 3;

function positiveInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value === '') return fallback;
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`Ignoring ${name}="${value}", using ${fallback}`);
    return fallback;
  }
  return parsed;
}

function getAviationWeatherConfig(): AviationWeatherConfig {
  return {
    apiUrl: (process.env.AVIATION_WEATHER_API_URL || DEFAULT_API_URL).replace(/\/+$/, ''),
    userAgent: process.env.AVIATION_WEATHER_USER_AGENT || DEFAULT_USER_AGENT,
    timeoutMs: positiveInt(process.env.REPORT_FETCH_TIMEOUT_MS, FETCH_TIMEOUT_MS, 'REPORT_FETCH_TIMEOUT_MS'),
    retries: positiveInt(process.env.REPORT_FETCH_RETRIES, MAX_RETRIES, 'REPORT_FETCH_RETRIES'),
  };
}

// Fetch with timeout and retry logic
async function fetchWithTimeoutAndRetry(
  url: string,
  options: RequestInit,
  config: AviationWeatherConfig
): Promise<Response> {
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < config.retries; attempt++) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);

    try {
      const response = await fetch(url, {
        ...options,
        signal: controller.signal,
      });
      clearTimeout(timeoutId);
      return response;
    } catch (error) {
      clearTimeout(timeoutId);
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt < config.retries - 1) {
        // Exponential backoff: 500ms, 1000ms, 2000ms
        await new Promise((resolve) => setTimeout(resolve, 500 * Math.pow(2, attempt)));
      }
    }
  }

  throw lastError || new Error('Fetch failed after retries');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

const optionalString = (value: unknown) => (typeof value === 'string' && value !== '' ? value : undefined);

function toMetarEntry(value: unknown): AwcMetarEntry | null {
  if (!isRecord(value)) return null;
  const icaoId = optionalString(value.icaoId);
  if (!icaoId) return null;

  const receiptTime = optionalString(value.receiptTime);
  const rawOb = optionalString(value.rawOb);
  const rawTaf = optionalString(value.rawTaf);
  const name = optionalString(value.name);
  return {
    icaoId: icaoId.toUpperCase(),
    ...(receiptTime ? { receiptTime } : {}),
    ...(rawOb ? { rawOb } : {}),
    ...(rawTaf ? { rawTaf } : {}),
    ...(name ? { name } : {}),
  };
}

// Fetch the latest METAR (with its TAF) for each station.
// Returns a map of station id -> entry, or null when the upstream call fails.
export async function getStationReports(ids: string[]): Promise<Record<string, AwcMetarEntry> | null> {
  if (ids.length === 0) return {};
  const config = getAviationWeatherConfig();
  const stations = ids.map((id) => id.toUpperCase()).join(',');
  const url = `${config.apiUrl}/metar?ids=${stations}&format=json&taf=true`;

  try {
    const response = await fetchWithTimeoutAndRetry(
      url,
      {
        headers: {
          'User-Agent': config.userAgent,
        },
        cache: 'no-store',
      },
      config
    );

    if (!response.ok) {
      console.error(`Aviation Weather API returned ${response.status} for ${stations}`);
      return null;
    }

    const data: unknown = await response.json();
    if (!Array.isArray(data)) return {};

    // Entries come newest first; keep the latest per station
    const result: Record<string, AwcMetarEntry> = {};
    for (const item of data) {
      const entry = toMetarEntry(item);
      if (entry && !result[entry.icaoId]) result[entry.icaoId] = entry;
    }
    return result;
  } catch (error) {
    console.error('Report fetch error:', error);
    return null;
  }
}
