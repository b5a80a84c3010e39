import { z } from 'zod';

export const BENGALURU = { lat: 12.9716, lon: 77.5946, timezone: 'Asia/Kolkata' } as const;

/** NASA's public key, used when no personal key is configured. Heavily rate limited. */
export const NASA_DEMO_KEY = 'DEMO_KEY';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  CHAT_API_KEY: z.string().min(1),
  CHAT_API_URL: z.string().url().default('https://api.openai.com/v1/chat/completions'),
  CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
  NASA_API_KEY: z.string().optional(),
  DEFAULT_LAT: z.coerce.number().min(-90).max(90).default(BENGALURU.lat),
  DEFAULT_LON: z.coerce.number().min(-180).max(180).default(BENGALURU.lon),
  DEFAULT_TIMEZONE: z.string().min(1).default(BENGALURU.timezone),
  FORECAST_DAYS: z.coerce.number().int().min(1).max(16).default(3),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CONTEXT_MAX_CHARS: z.coerce.number().int().min(200).default(1500),
  SESSION_TTL_MINUTES: z.coerce.number().positive().default(60),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://localhost:3001'),
});

export type EarthObservationKey = { kind: 'override'; apiKey: string } | { kind: 'demo' };

export interface AppConfig {
  port: number;
  chat: { apiKey: string; url: string; model: string };
  earthObservationKey: EarthObservationKey;
  defaults: { lat: number; lon: number; timezone: string; forecastDays: number };
  upstreamTimeoutMs: number;
  contextMaxChars: number;
  sessionTtlMs: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  corsOrigins: string[];
}

export function resolveNasaApiKey(key: EarthObservationKey): string {
  return key.kind === 'override' ? key.apiKey : NASA_DEMO_KEY;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const nasaKey = parsed.NASA_API_KEY?.trim();

  return {
    port: parsed.PORT,
    chat: { apiKey: parsed.CHAT_API_KEY, url: parsed.CHAT_API_URL, model: parsed.CHAT_MODEL },
    earthObservationKey: nasaKey ? { kind: 'override', apiKey: nasaKey } : { kind: 'demo' },
    defaults: {
      lat: parsed.DEFAULT_LAT,
      lon: parsed.DEFAULT_LON,
      timezone: parsed.DEFAULT_TIMEZONE,
      forecastDays: parsed.FORECAST_DAYS,
    },
    upstreamTimeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
    contextMaxChars: parsed.CONTEXT_MAX_CHARS,
    sessionTtlMs: parsed.SESSION_TTL_MINUTES * 60_000,
    logLevel: parsed.LOG_LEVEL,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean),
  };
}
