import type { AirQualityReading, ContextBlob, DerivedMetrics, EarthObservationSample, WeatherReading } from '../types.js';

export const NO_DATA_PLACEHOLDER =
  'No live environmental data is available right now. Answer from general knowledge and say that current readings are unavailable.';

export const DEFAULT_CONTEXT_MAX_CHARS = 1500;

export interface ContextInput {
  weather?: WeatherReading;
  airQuality?: AirQualityReading;
  earthObservation?: EarthObservationSample;
  derived?: DerivedMetrics;
}

type Section = { source: ContextBlob['sources'][number]; header: string; lines: string[] };

function cardinal(deg: number) {
  const dirs = ['N','NNE','NE','ENE','E','ESE','SE','SSE','S','SSW','SW','WSW','W','WNW','NW','NNW','N'];
  return dirs[Math.round((((deg % 360) + 360) % 360) / 22.5)];
}

// values go out exactly as supplied so parseContextFacts can read them back
const fact = (label: string, value: number, unit = '', note = '') =>
  `- ${label}: ${value}${unit ? ` ${unit}` : ''}${note ? ` (${note})` : ''}`;

function weatherSection(w: WeatherReading): Section {
  const lines = [
    fact('Temperature', w.temperatureC, '°C'),
    ...(w.apparentTemperatureC !== undefined ? [fact('Feels like', w.apparentTemperatureC, '°C')] : []),
    fact('Humidity', w.humidityPct, '%'),
    fact('Wind speed', w.windSpeedKmh, 'km/h'),
    fact('Wind direction', w.windDirectionDeg, '°', cardinal(w.windDirectionDeg)),
    fact('Weather code', w.weatherCode),
    ...(w.precipitationMm !== undefined ? [fact('Precipitation', w.precipitationMm, 'mm')] : []),
    fact('Recent rainfall', w.recentRainfallMm, 'mm', 'yesterday and today'),
  ];
  return { source: 'weather', header: `Weather (observed ${w.timestamp} ${w.timezone}):`, lines };
}

function forecastSection(w: WeatherReading): Section | undefined {
  const lines = w.daily
    .filter(d => d.maxC !== undefined && d.minC !== undefined)
    .map(d => `- Forecast ${d.date}: ${d.maxC} / ${d.minC} °C${d.precipitationMm !== undefined ? `, ${d.precipitationMm} mm rain` : ''}`);
  return lines.length ? { source: 'weather', header: 'Forecast (daily high / low):', lines } : undefined;
}

function airSection(a: AirQualityReading): Section {
  const optional: Array<[string, number | undefined]> = [['NO2', a.no2], ['O3', a.o3], ['CO', a.co], ['SO2', a.so2]];
  const lines = [
    fact('PM2.5', a.pm25, 'μg/m³'),
    fact('PM10', a.pm10, 'μg/m³'),
    ...optional.flatMap(([label, v]) => (v === undefined ? [] : [fact(label, v, 'μg/m³')])),
  ];
  return { source: 'airQuality', header: `Air quality (observed ${a.timestamp} ${a.timezone}):`, lines };
}

function earthSection(e: EarthObservationSample): Section | undefined {
  const lines: string[] = [];
  if (e.surfaceTemperatureC !== undefined) {
    lines.push(fact('Surface temperature', e.surfaceTemperatureC, '°C', e.surfaceTemperatureDate ?? ''));
  }
  if (e.imageryUrl) {
    lines.push(`- Satellite imagery: ${e.acquisitionDate ? `acquired ${e.acquisitionDate}` : 'available'}`);
  }
  return lines.length
    ? { source: 'earthObservation', header: `Earth observation (${e.location.lat}, ${e.location.lon}):`, lines }
    : undefined;
}

function derivedSection(d: DerivedMetrics): Section | undefined {
  const lines: string[] = [];
  if (d.heatIndexC !== undefined) lines.push(fact('Heat index', d.heatIndexC, '°C'));
  if (d.aqi) lines.push(fact('AQI estimate', d.aqi.aqi, '', `${d.aqi.category}, ${d.aqi.dominant === 'pm25' ? 'PM2.5' : 'PM10'} dominant`));
  if (d.comfortIndex !== undefined) lines.push(fact('Comfort index', d.comfortIndex, '/100'));
  if (d.lakeHealth) lines.push(fact('Lake health estimate', d.lakeHealth.score, '/100', `${d.lakeHealth.category}, heuristic`));
  if (d.coolingDemandPct !== undefined) lines.push(fact('Cooling demand', d.coolingDemandPct, '%'));
  return lines.length ? { source: 'derived', header: 'Derived metrics:', lines } : undefined;
}

/**
 * Deterministic text summary of the current readings for prompting.
 * Lines are dropped from the end to stay within maxChars.
 */
export function assembleContext(input: ContextInput, opts: { maxChars?: number } = {}): ContextBlob {
  const maxChars = opts.maxChars ?? DEFAULT_CONTEXT_MAX_CHARS;
  const { weather, airQuality, earthObservation, derived } = input;

  const sections = [
    weather && weatherSection(weather),
    airQuality && airSection(airQuality),
    derived && derivedSection(derived),
    earthObservation && earthSection(earthObservation),
    weather && forecastSection(weather),
  ].filter((s): s is Section => Boolean(s));

  if (!sections.length) {
    return { text: NO_DATA_PLACEHOLDER, sources: [], empty: true, truncated: false };
  }

  const rows: Array<{ source: Section['source']; line: string; header: boolean }> = sections.flatMap(s => [
    { source: s.source, line: s.header, header: true },
    ...s.lines.map(line => ({ source: s.source, line, header: false })),
  ]);

  let truncated = false;
  const size = () => rows.reduce((n, r) => n + r.line.length, 0) + rows.length - 1;
  while (rows.length > 1 && size() > maxChars) {
    rows.pop();
    truncated = true;
  }
  // a header with nothing under it says nothing
  while (rows.length && rows[rows.length - 1].header) rows.pop();

  if (!rows.length) {
    const text = NO_DATA_PLACEHOLDER.length <= maxChars ? NO_DATA_PLACEHOLDER : '';
    return { text, sources: [], empty: true, truncated: true };
  }

  const sources = [...new Set(rows.filter(r => !r.header).map(r => r.source))];
  return { text: rows.map(r => r.line).join('\n'), sources, empty: false, truncated };
}

const FACT_LINE = /^- ([^:]+): (-?\d+(?:\.\d+)?)(?=\s|$)/;

/** Numeric facts from an assembled context, keyed by label. */
export function parseContextFacts(text: string): Record<string, number> {
  const facts: Record<string, number> = {};
  for (const line of text.split('\n')) {
    const m = FACT_LINE.exec(line);
    if (m) facts[m[1]] = Number(m[2]);
  }
  return facts;
}
