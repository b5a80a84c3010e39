import { z } from 'zod';
import { subDays } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { fetchJson } from '../utils/http.js';
import type { EarthObservationQuery, EarthObservationSample, FetchResult } from '../types.js';

const ASSETS_URL = 'https://api.nasa.gov/planetary/earth/assets';
const POWER_URL = 'https://power.larc.nasa.gov/api/temporal/daily/point';
const POWER_FILL = -999;
const DEFAULT_RANGE_DAYS = 7;
const IMAGE_DIM_DEG = 0.1;

const AssetsJSON = z.object({
  date: z.string().optional(),
  id: z.string().optional(),
  url: z.string().url().optional(),
});

const PowerJSON = z.object({
  properties: z.object({
    parameter: z.object({
      TS: z.record(z.number()),
    }),
  }),
});

export interface EarthObservationOptions {
  apiKey: string;
  timeoutMs?: number;
  now?: () => Date;
}

/** Latest non-fill skin temperature from a POWER daily series keyed 'yyyyMMdd'. */
export function latestSurfaceTemperature(series: Record<string, number>): { date: string; valueC: number } | undefined {
  const days = Object.keys(series).filter(k => series[k] !== POWER_FILL && Number.isFinite(series[k])).sort();
  const last = days[days.length - 1];
  if (!last) return undefined;
  return { date: `${last.slice(0, 4)}-${last.slice(4, 6)}-${last.slice(6, 8)}`, valueC: series[last] };
}

/**
 * Imagery reference from NASA Earth assets plus a skin temperature sample from NASA POWER.
 * Either half may fail on its own; the call only fails when both do.
 */
export async function fetchEarthObservation(
  q: EarthObservationQuery,
  opts: EarthObservationOptions,
): Promise<FetchResult<EarthObservationSample>> {
  const end = q.end ?? (opts.now ?? (() => new Date()))();
  const start = q.start ?? subDays(end, DEFAULT_RANGE_DAYS);

  const assets = new URL(ASSETS_URL);
  assets.searchParams.set('lat', String(q.lat));
  assets.searchParams.set('lon', String(q.lon));
  assets.searchParams.set('date', formatInTimeZone(end, 'UTC', 'yyyy-MM-dd'));
  assets.searchParams.set('dim', String(IMAGE_DIM_DEG));
  assets.searchParams.set('api_key', opts.apiKey);

  const power = new URL(POWER_URL);
  power.searchParams.set('parameters', 'TS');
  power.searchParams.set('community', 'RE');
  power.searchParams.set('latitude', String(q.lat));
  power.searchParams.set('longitude', String(q.lon));
  power.searchParams.set('start', formatInTimeZone(start, 'UTC', 'yyyyMMdd'));
  power.searchParams.set('end', formatInTimeZone(end, 'UTC', 'yyyyMMdd'));
  power.searchParams.set('format', 'JSON');

  const [imagery, temperature] = await Promise.all([
    fetchJson('earthObservation', assets.toString(), AssetsJSON, { timeoutMs: opts.timeoutMs }),
    fetchJson('earthObservation', power.toString(), PowerJSON, { timeoutMs: opts.timeoutMs }),
  ]);

  if (!imagery.ok && !temperature.ok) return imagery;

  const sample: EarthObservationSample = { location: { lat: q.lat, lon: q.lon } };
  if (imagery.ok) {
    sample.imageryUrl = imagery.value.url;
    sample.acquisitionDate = imagery.value.date?.slice(0, 10);
  }
  if (temperature.ok) {
    const latest = latestSurfaceTemperature(temperature.value.properties.parameter.TS);
    if (latest) {
      sample.surfaceTemperatureC = latest.valueC;
      sample.surfaceTemperatureDate = latest.date;
    }
  }
  return { ok: true, value: sample };
}
