export interface ClimateReading {
  temperatureC: number | null; // mean monthly temperature
  rainMm: number | null; // monthly precipitation sum
}

/** Breakpoints of the temperature comfort curve and the rain penalty. */
export interface ComfortCurve {
  coolMax: number;
  mildMax: number;
  idealMax: number;
  hotMax: number;
  coolScore: number;
  mildScore: number;
  idealScore: number;
  hotScore: number;
  extremeScore: number;
  neutralScore: number;
  rainPenaltyPer60mm: number;
  maxRainPenalty: number;
}

export const DEFAULT_COMFORT_CURVE: ComfortCurve = Object.freeze({
  coolMax: 18,
  mildMax: 22,
  idealMax: 30,
  hotMax: 34,
  coolScore: 0.2,
  mildScore: 0.8,
  idealScore: 1.0,
  hotScore: 0.6,
  extremeScore: 0.4,
  neutralScore: 0.5,
  rainPenaltyPer60mm: 0.15,
  maxRainPenalty: 0.6,
});

function ramp(x: number, x0: number, x1: number, y0: number, y1: number): number {
  return y0 + ((x - x0) * (y1 - y0)) / (x1 - x0);
}

export function temperatureComfort(
  temperatureC: number | null,
  curve: ComfortCurve = DEFAULT_COMFORT_CURVE
): number {
  if (temperatureC === null || !Number.isFinite(temperatureC)) return curve.neutralScore;
  const t = temperatureC;
  if (t <= curve.coolMax) return curve.coolScore;
  if (t <= curve.mildMax) return ramp(t, curve.coolMax, curve.mildMax, curve.coolScore, curve.mildScore);
  if (t <= curve.idealMax) return ramp(t, curve.mildMax, curve.idealMax, curve.mildScore, curve.idealScore);
  if (t <= curve.hotMax) return ramp(t, curve.idealMax, curve.hotMax, curve.idealScore, curve.hotScore);
  return curve.extremeScore;
}

export function rainPenalty(
  rainMm: number | null,
  curve: ComfortCurve = DEFAULT_COMFORT_CURVE
): number {
  if (rainMm === null || !Number.isFinite(rainMm)) return 0;
  return Math.min(curve.maxRainPenalty, (rainMm / 60) * curve.rainPenaltyPer60mm);
}

/** Temperature comfort minus rain penalty, clamped to [0, 1]. */
export function climateSuitability(
  reading: ClimateReading,
  curve: ComfortCurve = DEFAULT_COMFORT_CURVE
): number {
  const score = temperatureComfort(reading.temperatureC, curve) - rainPenalty(reading.rainMm, curve);
  return Math.max(0, Math.min(1, score));
}
