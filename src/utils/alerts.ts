// src/utils/alerts.ts
import { formatInTimeZone } from 'date-fns-tz';
import type { AirQualityReading, DerivedMetrics, WeatherReading } from '../types.js';
import type { StakeholderId } from '../logic/stakeholders.js';

export type AlertLevel = 'info' | 'warning' | 'danger';

export interface AlertItem {
  text: string;
  level: AlertLevel;
  source: string;
}

const TH = {
  HOT_C: 35,
  COOL_C: 15,
  HEAT_INDEX_WARN: 32,
  HEAT_INDEX_DANGER: 40,
  PM25_GOOD: 25,          // μg/m³
  PM25_MODERATE: 50,
  AQI_WARN: 101,          // unhealthy for sensitive groups
  AQI_DANGER: 151,
  COOLING_WARN: 60,       // % of peak
};

export const ALL_CLEAR = 'Great conditions today! Enjoy outdoor activities safely.';

export function healthRecommendations(weather?: WeatherReading, air?: AirQualityReading): string[] {
  const recs: string[] = [];
  if (weather && weather.temperatureC > TH.HOT_C) {
    recs.push('Drink plenty of water throughout the day');
    recs.push('Wear light-colored, loose-fitting clothes');
    recs.push('Avoid outdoor activities between 11 AM and 4 PM');
  }
  if (air && air.pm25 > TH.PM25_GOOD) {
    recs.push('Wear N95 masks when outdoors');
    recs.push('Keep windows closed during high pollution hours');
    recs.push('Consider indoor exercise instead of outdoor jogging');
  }
  if (!recs.length) recs.push(ALL_CLEAR);
  return recs;
}

export function computeAdvisories(opts: {
  weather?: WeatherReading;
  airQuality?: AirQualityReading;
  derived: DerivedMetrics;
  stakeholder: StakeholderId;
  timezone: string;
  now?: Date;
}): AlertItem[] {
  const { weather, airQuality, derived, stakeholder, timezone } = opts;
  const alerts: AlertItem[] = [];

  // Temperature
  if (weather) {
    const t = weather.temperatureC;
    if (t > TH.HOT_C)
      alerts.push({ level: 'warning', source: 'weather', text: `Very hot day (${t}°C). Stay hydrated and avoid outdoor activities during peak hours.` });
    else if (t < TH.COOL_C)
      alerts.push({ level: 'info', source: 'weather', text: `Cool day (${t}°C). You might want to carry a light jacket.` });
    else if (stakeholder === 'citizens')
      alerts.push({ level: 'info', source: 'weather', text: `Pleasant weather (${t}°C) for outdoor activities.` });
  }

  // Heat stress
  if (derived.heatIndexC !== undefined) {
    if (derived.heatIndexC >= TH.HEAT_INDEX_DANGER)
      alerts.push({ level: 'danger', source: 'derived', text: `Dangerous heat stress (heat index ~ ${Math.round(derived.heatIndexC)}°C).` });
    else if (derived.heatIndexC >= TH.HEAT_INDEX_WARN)
      alerts.push({ level: 'warning', source: 'derived', text: `Heat stress (heat index ~ ${Math.round(derived.heatIndexC)}°C).` });
  }

  // Air quality
  if (airQuality) {
    const pm = airQuality.pm25;
    if (pm <= TH.PM25_GOOD)
      alerts.push({ level: 'info', source: 'airQuality', text: `Good air quality (PM2.5 ${pm} μg/m³), safe for outdoor activities.` });
    else if (pm <= TH.PM25_MODERATE)
      alerts.push({ level: 'warning', source: 'airQuality', text: `Moderate air quality (PM2.5 ${pm} μg/m³). Sensitive individuals should limit outdoor activities.` });
    else
      alerts.push({ level: 'danger', source: 'airQuality', text: `Poor air quality (PM2.5 ${pm} μg/m³). Wear masks outdoors and limit exposure.` });
  }
  if (derived.aqi) {
    if (derived.aqi.aqi >= TH.AQI_DANGER)
      alerts.push({ level: 'danger', source: 'derived', text: `AQI ${derived.aqi.aqi} (${derived.aqi.category}).` });
    else if (derived.aqi.aqi >= TH.AQI_WARN)
      alerts.push({ level: 'warning', source: 'derived', text: `AQI ${derived.aqi.aqi} (${derived.aqi.category}).` });
  }

  // Stakeholder specific
  if (stakeholder === 'electricity' && derived.coolingDemandPct !== undefined && derived.coolingDemandPct > 0) {
    const level: AlertLevel = derived.coolingDemandPct >= TH.COOLING_WARN ? 'warning' : 'info';
    alerts.push({ level, source: 'derived', text: `Cooling demand at ${derived.coolingDemandPct}% of peak. Prepare for afternoon load.` });
  }
  if (stakeholder === 'water-board' && derived.lakeHealth) {
    const { score, category } = derived.lakeHealth;
    const level: AlertLevel = category === 'Poor' ? 'danger' : category === 'Fair' ? 'warning' : 'info';
    alerts.push({ level, source: 'derived', text: `Estimated lake health ${score}/100 (${category}). Heuristic, verify with field sampling.` });
  }

  if (!alerts.length) {
    const localLabel = formatInTimeZone(opts.now ?? new Date(), timezone, 'MMM d, yyyy');
    alerts.push({ level: 'info', source: 'dashboard', text: `No significant alerts for ${localLabel}.` });
  }

  // dedup by level + text
  const seen = new Set<string>();
  return alerts.filter(a => {
    const k = `${a.level}|${a.text}`;
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}
