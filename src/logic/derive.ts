import {
  comfortIndex, coolingDemandPct, heatIndex, lakeHealthEstimate, simplifiedAQI,
} from '../utils/metrics.js';
import type { AirQualityReading, DerivedMetrics, EarthObservationSample, WeatherReading } from '../types.js';

export const DEFAULT_TURBIDITY_PROXY = 0.5;

export interface DeriveInput {
  weather?: WeatherReading;
  airQuality?: AirQualityReading;
  earthObservation?: EarthObservationSample;
}

/** Recomputed per request; a metric is only present when its inputs are. */
export function deriveMetrics(input: DeriveInput, opts: { turbidityProxy?: number } = {}): DerivedMetrics {
  const { weather, airQuality, earthObservation } = input;
  const out: DerivedMetrics = {};

  if (weather) {
    out.heatIndexC = heatIndex(weather.temperatureC, weather.humidityPct);
    out.comfortIndex = comfortIndex(weather.temperatureC, weather.humidityPct, weather.windSpeedKmh);
    out.coolingDemandPct = coolingDemandPct(weather.temperatureC);
  }
  if (airQuality) {
    out.aqi = simplifiedAQI(airQuality.pm25, airQuality.pm10);
  }

  // surface temperature is the closer proxy for water temperature when we have it
  const waterTemp = earthObservation?.surfaceTemperatureC ?? weather?.temperatureC;
  if (waterTemp !== undefined && weather) {
    out.lakeHealth = lakeHealthEstimate(waterTemp, weather.recentRainfallMm, opts.turbidityProxy ?? DEFAULT_TURBIDITY_PROXY);
  }
  return out;
}

export function hasDerived(d: DerivedMetrics): boolean {
  return Object.values(d).some(v => v !== undefined);
}
