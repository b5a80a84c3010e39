import type { Logger } from '../logger.js';
import {
  fail,
  type EnvironmentClients, type EnvironmentSnapshot, type FetchResult, type SourceFailure, type WeatherQuery,
} from '../types.js';

type Source = SourceFailure['source'];

// adapters report upstream trouble as values; anything thrown is a bug we still degrade on
async function guard<T>(source: Source, call: () => Promise<FetchResult<T>>): Promise<FetchResult<T>> {
  try {
    return await call();
  } catch (err) {
    return fail({ kind: 'Unreachable', source, message: err instanceof Error ? err.message : String(err) });
  }
}

/**
 * Fetch weather, air quality and earth observation side by side.
 * A failed source is recorded and left absent; the snapshot itself never fails.
 */
export async function collectSnapshot(
  clients: EnvironmentClients,
  query: WeatherQuery,
  logger: Logger,
): Promise<EnvironmentSnapshot> {
  const { lat, lon } = query;
  const [weather, airQuality, earthObservation] = await Promise.all([
    guard('weather', () => clients.weather(query)),
    guard('airQuality', () => clients.airQuality({ lat, lon, timezone: query.timezone })),
    guard('earthObservation', () => clients.earthObservation({ lat, lon })),
  ]);

  const failures: SourceFailure[] = [];
  const take = <T>(source: Source, res: FetchResult<T>): T | undefined => {
    if (res.ok) return res.value;
    failures.push({ source, kind: res.error.kind, message: res.error.message });
    logger.warn({ source, kind: res.error.kind, status: res.error.status }, res.error.message);
    return undefined;
  };

  return {
    weather: take('weather', weather),
    airQuality: take('airQuality', airQuality),
    earthObservation: take('earthObservation', earthObservation),
    failures,
  };
}
