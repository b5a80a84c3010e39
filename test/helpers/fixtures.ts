import pino from 'pino';
import type { AppConfig } from '../../src/config.js';
import type {
  AdapterError, AirQualityReading, ChatClient, EarthObservationSample, EnvironmentClients, WeatherReading,
} from '../../src/types.js';

export const silentLogger = pino({ level: 'silent' });

export const weather: WeatherReading = {
  timestamp: '2024-05-01T14:00',
  timezone: 'Asia/Kolkata',
  location: { lat: 12.97, lon: 77.59 },
  temperatureC: 30,
  humidityPct: 70,
  apparentTemperatureC: 34.9,
  precipitationMm: 0,
  windSpeedKmh: 12.6,
  windDirectionDeg: 245,
  weatherCode: 2,
  recentRainfallMm: 4,
  daily: [
    { date: '2024-05-01', maxC: 33.2, minC: 22.1, precipitationMm: 0.4 },
    { date: '2024-05-02', maxC: 32.8, minC: 21.7, precipitationMm: 3.5 },
  ],
};

export const airQuality: AirQualityReading = {
  timestamp: '2024-05-01T14:00',
  timezone: 'Asia/Kolkata',
  location: { lat: 12.97, lon: 77.59 },
  pm25: 38.2,
  pm10: 72,
  no2: 25.1,
};

export const earthObservation: EarthObservationSample = {
  location: { lat: 12.9716, lon: 77.5946 },
  imageryUrl: 'https://earthengine.example.test/thumbnail.png',
  acquisitionDate: '2024-04-22',
  surfaceTemperatureC: 31.25,
  surfaceTemperatureDate: '2024-04-29',
};

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    chat: { apiKey: 'test-secret', url: 'https://llm.example.test/v1/chat/completions', model: 'test-model' },
    earthObservationKey: { kind: 'demo' },
    defaults: { lat: 12.9716, lon: 77.5946, timezone: 'Asia/Kolkata', forecastDays: 3 },
    upstreamTimeoutMs: 1000,
    contextMaxChars: 1500,
    sessionTtlMs: 60_000,
    logLevel: 'silent',
    corsOrigins: ['http://localhost:5173'],
    ...overrides,
  };
}

export function unreachable(source: 'weather' | 'airQuality' | 'earthObservation'): { ok: false; error: AdapterError } {
  return { ok: false, error: { kind: 'Unreachable', source, message: 'request timed out' } };
}

export function fakeClients(overrides: Partial<EnvironmentClients> = {}): EnvironmentClients {
  return {
    weather: async () => ({ ok: true, value: weather }),
    airQuality: async () => ({ ok: true, value: airQuality }),
    earthObservation: async () => ({ ok: true, value: earthObservation }),
    ...overrides,
  };
}

/** Chat stand-in that answers with the context message it was given. */
export function echoChat(): ChatClient {
  return {
    complete: async messages => ({ ok: true, value: messages[1]?.content ?? '' }),
  };
}
