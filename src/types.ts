// ====== Shared domain types ======

export interface Coordinates {
  lat: number;
  lon: number;
}

export interface LocationQuery extends Coordinates {
  timezone?: string;        // IANA name, 'auto' lets the upstream decide
}

export interface WeatherQuery extends LocationQuery {
  forecastDays?: number;    // 1..16
}

export interface EarthObservationQuery extends Coordinates {
  start?: Date;
  end?: Date;
}

export interface DailyForecast {
  date: string;             // 'yyyy-MM-dd' local
  maxC?: number;
  minC?: number;
  precipitationMm?: number;
}

export interface WeatherReading {
  timestamp: string;        // local ISO without offset, as returned upstream
  timezone: string;
  location: Coordinates;
  temperatureC: number;
  humidityPct: number;
  apparentTemperatureC?: number;
  precipitationMm?: number;
  windSpeedKmh: number;
  windDirectionDeg: number;
  weatherCode: number;
  recentRainfallMm: number;
  daily: DailyForecast[];
}

export interface AirQualityReading {
  timestamp: string;
  timezone: string;
  location: Coordinates;
  pm25: number;             // μg/m³
  pm10: number;             // μg/m³
  no2?: number;
  o3?: number;
  co?: number;
  so2?: number;
}

export interface EarthObservationSample {
  location: Coordinates;
  acquisitionDate?: string;
  imageryUrl?: string;
  surfaceTemperatureC?: number;
  surfaceTemperatureDate?: string;   // 'yyyy-MM-dd'
}

// ====== Derived metrics ======

export type AqiCategory =
  | 'Good'
  | 'Moderate'
  | 'Unhealthy-for-Sensitive'
  | 'Unhealthy'
  | 'Very-Unhealthy'
  | 'Hazardous';

export interface AqiEstimate {
  aqi: number;              // 0..500
  category: AqiCategory;
  dominant: 'pm25' | 'pm10';
}

export type LakeHealthCategory = 'Good' | 'Fair' | 'Poor';

export interface LakeHealth {
  score: number;            // 0..100
  category: LakeHealthCategory;
  estimate: true;
}

export interface DerivedMetrics {
  heatIndexC?: number;
  aqi?: AqiEstimate;
  comfortIndex?: number;
  lakeHealth?: LakeHealth;
  coolingDemandPct?: number;
}

// ====== Results & errors ======

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type AdapterErrorKind = 'Unauthorized' | 'RateLimited' | 'Unreachable' | 'MalformedResponse';

export type SourceName = 'weather' | 'airQuality' | 'earthObservation' | 'chat';

export interface AdapterError {
  kind: AdapterErrorKind;
  source: SourceName;
  message: string;
  status?: number;
}

export type FetchResult<T> = Result<T, AdapterError>;

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail(error: AdapterError): { ok: false; error: AdapterError } {
  return { ok: false, error };
}

// ====== Adapters ======

export interface EnvironmentClients {
  weather(query: WeatherQuery): Promise<FetchResult<WeatherReading>>;
  airQuality(query: LocationQuery): Promise<FetchResult<AirQualityReading>>;
  earthObservation(query: EarthObservationQuery): Promise<FetchResult<EarthObservationSample>>;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatClient {
  complete(messages: ChatMessage[]): Promise<FetchResult<string>>;
}

// ====== Snapshot / context / chat ======

export interface SourceFailure {
  source: Exclude<SourceName, 'chat'>;
  kind: AdapterErrorKind;
  message: string;
}

export interface EnvironmentSnapshot {
  weather?: WeatherReading;
  airQuality?: AirQualityReading;
  earthObservation?: EarthObservationSample;
  failures: SourceFailure[];
}

export interface ContextBlob {
  text: string;
  sources: Array<Exclude<SourceName, 'chat'> | 'derived'>;
  empty: boolean;
  truncated: boolean;
}

export interface ChatTurn {
  role: 'user' | 'assistant';
  text: string;
  timestamp: string;        // ISO
}

export type ConversationState = 'Idle' | 'AwaitingReply';

export type ChatErrorKind = AdapterErrorKind | 'Busy' | 'Unexpected';

export interface ChatReply {
  ok: boolean;
  text: string;
  error?: ChatErrorKind;
}
