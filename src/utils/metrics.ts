import type { AqiCategory, AqiEstimate, LakeHealth, LakeHealthCategory } from '../types.js';

// ====== Helpers ======
function clamp(v: number, lo: number, hi: number) {
  if (Number.isNaN(v)) return lo;
  return Math.min(hi, Math.max(lo, v));
}
const round1 = (n: number) => Math.round(n * 10) / 10;
const cToF = (c: number) => c * 9 / 5 + 32;
const fToC = (f: number) => (f - 32) * 5 / 9;

// ====== Heat index ======

/** NWS heat index constants (°F regression). Override to experiment with other fits. */
export const HEAT_INDEX_CONSTANTS = {
  minTemperatureC: 26.7,
  rothfusz: [
    -42.379, 2.04901523, 10.14333127, -0.22475541, -0.00683783,
    -0.05481717, 0.00122874, 0.00085282, -0.00000199,
  ] as const,
};

export type HeatIndexConstants = typeof HEAT_INDEX_CONSTANTS;

/**
 * Apparent temperature from air temperature and relative humidity.
 * Outside the modelled domain the temperature comes back unchanged.
 */
export function heatIndex(
  temperatureC: number,
  relativeHumidityPct: number,
  constants: HeatIndexConstants = HEAT_INDEX_CONSTANTS,
): number {
  if (!Number.isFinite(temperatureC) || !Number.isFinite(relativeHumidityPct)) return temperatureC;
  if (temperatureC < constants.minTemperatureC) return temperatureC;
  if (relativeHumidityPct < 0 || relativeHumidityPct > 100) return temperatureC;

  const T = cToF(temperatureC);
  const R = relativeHumidityPct;
  const simple = 0.5 * (T + 61 + (T - 68) * 1.2 + R * 0.094);
  if ((simple + T) / 2 < 80) return round1(fToC(simple));

  const [c1, c2, c3, c4, c5, c6, c7, c8, c9] = constants.rothfusz;
  let hi = c1 + c2 * T + c3 * R + c4 * T * R + c5 * T * T
    + c6 * R * R + c7 * T * T * R + c8 * T * R * R + c9 * T * T * R * R;

  if (R < 13 && T >= 80 && T <= 112) {
    hi -= ((13 - R) / 4) * Math.sqrt((17 - Math.abs(T - 95)) / 17);
  } else if (R > 85 && T >= 80 && T <= 87) {
    hi += ((R - 85) / 10) * ((87 - T) / 5);
  }
  // the regression dips under the simple estimate right where it takes over
  return round1(fToC(Math.max(hi, simple)));
}

// ====== AQI ======

export interface Breakpoint {
  cLow: number;
  cHigh: number;
  iLow: number;
  iHigh: number;
}

export interface AqiBreakpoints {
  pm25: Breakpoint[];
  pm10: Breakpoint[];
}

const INDEX_BANDS: Array<[number, number]> = [[0, 50], [51, 100], [101, 150], [151, 200], [201, 300], [301, 500]];

function table(concentrations: Array<[number, number]>): Breakpoint[] {
  return concentrations.map(([cLow, cHigh], i) => ({ cLow, cHigh, iLow: INDEX_BANDS[i][0], iHigh: INDEX_BANDS[i][1] }));
}

export const AQI_BREAKPOINTS: AqiBreakpoints = {
  pm25: table([[0, 12], [12.1, 35.4], [35.5, 55.4], [55.5, 150.4], [150.5, 250.4], [250.5, 500.4]]),
  pm10: table([[0, 54], [55, 154], [155, 254], [255, 354], [355, 424], [425, 604]]),
};

export const AQI_CATEGORY_THRESHOLDS: Array<[number, AqiCategory]> = [
  [50, 'Good'],
  [100, 'Moderate'],
  [150, 'Unhealthy-for-Sensitive'],
  [200, 'Unhealthy'],
  [300, 'Very-Unhealthy'],
];

/** Decimals each pollutant is truncated to before the table lookup (EPA reporting precision). */
export const AQI_TRUNCATION = { pm25: 1, pm10: 0 } as const;

function truncate(v: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.floor(v * f) / f;
}

function subIndex(concentration: number, bps: Breakpoint[], decimals: number): number {
  const c = Number.isFinite(concentration) ? truncate(Math.max(0, concentration), decimals) : 0;
  const bp = bps.find(b => c <= b.cHigh);
  if (!bp) return 500;
  return Math.round(((bp.iHigh - bp.iLow) / (bp.cHigh - bp.cLow)) * (c - bp.cLow) + bp.iLow);
}

export function aqiCategory(aqi: number): AqiCategory {
  for (const [max, category] of AQI_CATEGORY_THRESHOLDS) {
    if (aqi <= max) return category;
  }
  return 'Hazardous';
}

/**
 * Higher of the PM2.5 / PM10 sub-indices, on the 0..500 scale.
 * Concentrations are truncated first so values between table rows fall in the lower row.
 */
export function simplifiedAQI(pm25: number, pm10: number, breakpoints: AqiBreakpoints = AQI_BREAKPOINTS): AqiEstimate {
  const a = subIndex(pm25, breakpoints.pm25, AQI_TRUNCATION.pm25);
  const b = subIndex(pm10, breakpoints.pm10, AQI_TRUNCATION.pm10);
  const aqi = clamp(Math.max(a, b), 0, 500);
  return { aqi, category: aqiCategory(aqi), dominant: b > a ? 'pm10' : 'pm25' };
}

// ====== Comfort ======

export const COMFORT = {
  idealLowC: 20,
  idealHighC: 26,
  perDegree: 4,
  humidHighPct: 60,
  perHumidPoint: 0.5,
  dryLowPct: 30,
  perDryPoint: 0.3,
  breezeKmh: [5, 20] as const,
  breezeBonus: 5,
  galeKmh: 40,
  perGaleKmh: 0.5,
};

/** Outdoor comfort 0..100. Out-of-range inputs are clamped, never rejected. */
export function comfortIndex(temperatureC: number, humidityPct: number, windSpeedKmh: number): number {
  const t = clamp(temperatureC, -30, 50);
  const rh = clamp(humidityPct, 0, 100);
  const wind = clamp(windSpeedKmh, 0, 100);

  const offBand = t < COMFORT.idealLowC ? COMFORT.idealLowC - t : t > COMFORT.idealHighC ? t - COMFORT.idealHighC : 0;
  let score = 100 - offBand * COMFORT.perDegree;
  score -= Math.max(0, rh - COMFORT.humidHighPct) * COMFORT.perHumidPoint;
  score -= Math.max(0, COMFORT.dryLowPct - rh) * COMFORT.perDryPoint;
  if (wind >= COMFORT.breezeKmh[0] && wind <= COMFORT.breezeKmh[1]) score += COMFORT.breezeBonus;
  score -= Math.max(0, wind - COMFORT.galeKmh) * COMFORT.perGaleKmh;

  return clamp(Math.round(score), 0, 100);
}

// ====== Lake health ======

export const LAKE = {
  warmAboveC: 25,
  perWarmDegree: 4,
  perRainMm: 1.5,
  maxRainPenalty: 30,
  turbidityWeight: 40,
  goodFrom: 70,
  fairFrom: 50,
};

function lakeCategory(score: number): LakeHealthCategory {
  if (score >= LAKE.goodFrom) return 'Good';
  if (score >= LAKE.fairFrom) return 'Fair';
  return 'Poor';
}

/**
 * Heuristic lake condition score. Not a measurement: no ground truth backs the weights.
 * turbidityProxy is a 0..1 stand-in for water clarity (1 = very turbid).
 */
export function lakeHealthEstimate(waterTemperatureC: number, recentRainfallMm: number, turbidityProxy: number): LakeHealth {
  const t = clamp(waterTemperatureC, -10, 50);
  const rain = clamp(recentRainfallMm, 0, 1000);
  const turbidity = clamp(turbidityProxy, 0, 1);

  const score = clamp(Math.round(
    100
    - Math.max(0, t - LAKE.warmAboveC) * LAKE.perWarmDegree
    - Math.min(LAKE.maxRainPenalty, rain * LAKE.perRainMm)
    - turbidity * LAKE.turbidityWeight,
  ), 0, 100);

  return { score, category: lakeCategory(score), estimate: true };
}

// ====== Cooling demand ======

/** Share of peak cooling load (%) for the grid operator view; ramps from 25 °C to full at 35 °C. */
export function coolingDemandPct(temperatureC: number): number {
  if (!Number.isFinite(temperatureC) || temperatureC <= 25) return 0;
  return Math.min(100, Math.round((temperatureC - 25) * 10));
}
