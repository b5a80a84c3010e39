import { resolveNasaApiKey, type AppConfig } from '../config.js';
import type { ChatClient, EnvironmentClients } from '../types.js';
import { createChatClient } from './chat.js';
import { fetchEarthObservation } from './nasa.js';
import { fetchAirQuality, fetchWeather } from './openMeteo.js';

export function createEnvironmentClients(config: AppConfig): EnvironmentClients {
  const timeoutMs = config.upstreamTimeoutMs;
  const apiKey = resolveNasaApiKey(config.earthObservationKey);
  return {
    weather: q => fetchWeather(q, { timeoutMs }),
    airQuality: q => fetchAirQuality(q, { timeoutMs }),
    earthObservation: q => fetchEarthObservation(q, { apiKey, timeoutMs }),
  };
}

export function createConfiguredChatClient(config: AppConfig): ChatClient {
  return createChatClient({ ...config.chat, timeoutMs: config.upstreamTimeoutMs });
}
