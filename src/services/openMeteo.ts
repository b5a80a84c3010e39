import { z } from 'zod';
import { fetchJson } from '../utils/http.js';
import type {
  AirQualityReading, DailyForecast, FetchResult, LocationQuery, WeatherQuery, WeatherReading,
} from '../types.js';

const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';
const AIR_QUALITY_URL = 'https://air-quality-api.open-meteo.com/v1/air-quality';

const CURRENT_WEATHER = [
  'temperature_2m', 'relative_humidity_2m', 'apparent_temperature', 'precipitation',
  'weather_code', 'wind_speed_10m', 'wind_direction_10m',
] as const;
const DAILY_WEATHER = ['temperature_2m_max', 'temperature_2m_min', 'precipitation_sum'] as const;
const CURRENT_AIR = ['pm2_5', 'pm10', 'nitrogen_dioxide', 'ozone', 'carbon_monoxide', 'sulphur_dioxide'] as const;

// ====== Upstream shapes (only what we read) ======
const num = z.number();
const maybeNum = z.number().nullish().transform(v => v ?? undefined);
const series = z.array(z.number().nullable()).default([]);

const ForecastJSON = z.object({
  latitude: num,
  longitude: num,
  timezone: z.string().default('GMT'),
  current: z.object({
    time: z.string(),
    temperature_2m: num,
    relative_humidity_2m: num,
    apparent_temperature: maybeNum,
    precipitation: maybeNum,
    weather_code: num,
    wind_speed_10m: num,
    wind_direction_10m: num,
  }),
  daily: z.object({
    time: z.array(z.string()),
    temperature_2m_max: series,
    temperature_2m_min: series,
    precipitation_sum: series,
  }).optional(),
});

const AirQualityJSON = z.object({
  latitude: num,
  longitude: num,
  timezone: z.string().default('GMT'),
  current: z.object({
    time: z.string(),
    pm2_5: num,
    pm10: num,
    nitrogen_dioxide: maybeNum,
    ozone: maybeNum,
    carbon_monoxide: maybeNum,
    sulphur_dioxide: maybeNum,
  }),
});

export interface RequestOptions {
  timeoutMs?: number;
}

function locationParams(q: LocationQuery) {
  return {
    latitude: String(q.lat),
    longitude: String(q.lon),
    timezone: q.timezone ?? 'auto',
  };
}

const defined = (v: number | null | undefined) => (v === null || v === undefined ? undefined : v);

export async function fetchWeather(q: WeatherQuery, opts: RequestOptions = {}): Promise<FetchResult<WeatherReading>> {
  const url = new URL(FORECAST_URL);
  const params = {
    ...locationParams(q),
    current: CURRENT_WEATHER.join(','),
    daily: DAILY_WEATHER.join(','),
    forecast_days: String(Math.min(16, Math.max(1, q.forecastDays ?? 3))),
    past_days: '1',
    wind_speed_unit: 'kmh',
  };
  for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

  const res = await fetchJson('weather', url.toString(), ForecastJSON, { timeoutMs: opts.timeoutMs });
  if (!res.ok) return res;

  const { current, daily } = res.value;
  const days: DailyForecast[] = (daily?.time ?? []).map((date, i) => ({
    date,
    maxC: defined(daily?.temperature_2m_max[i]),
    minC: defined(daily?.temperature_2m_min[i]),
    precipitationMm: defined(daily?.precipitation_sum[i]),
  }));

  // yesterday (past_days=1) + today so far
  const today = current.time.slice(0, 10);
  const recentRainfallMm = days
    .filter(d => d.date <= today)
    .reduce((sum, d) => sum + (d.precipitationMm ?? 0), 0);

  return {
    ok: true,
    value: {
      timestamp: current.time,
      timezone: res.value.timezone,
      location: { lat: res.value.latitude, lon: res.value.longitude },
      temperatureC: current.temperature_2m,
      humidityPct: current.relative_humidity_2m,
      apparentTemperatureC: current.apparent_temperature,
      precipitationMm: current.precipitation,
      windSpeedKmh: current.wind_speed_10m,
      windDirectionDeg: current.wind_direction_10m,
      weatherCode: current.weather_code,
      recentRainfallMm: Math.round(recentRainfallMm * 10) / 10,
      daily: days.filter(d => d.date >= today),
    },
  };
}

export async function fetchAirQuality(q: LocationQuery, opts: RequestOptions = {}): Promise<FetchResult<AirQualityReading>> {
  const url = new URL(AIR_QUALITY_URL);
  const params = { ...locationParams(q), current: CURRENT_AIR.join(',') };
  for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

  const res = await fetchJson('airQuality', url.toString(), AirQualityJSON, { timeoutMs: opts.timeoutMs });
  if (!res.ok) return res;

  const { current } = res.value;
  return {
    ok: true,
    value: {
      timestamp: current.time,
      timezone: res.value.timezone,
      location: { lat: res.value.latitude, lon: res.value.longitude },
      pm25: current.pm2_5,
      pm10: current.pm10,
      no2: current.nitrogen_dioxide,
      o3: current.ozone,
      co: current.carbon_monoxide,
      so2: current.sulphur_dioxide,
    },
  };
}
