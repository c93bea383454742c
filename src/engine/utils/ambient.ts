/**
 * Ambient-state helpers for the collaborators that build a request.
 * The engine itself only ever receives a resolved barometric pressure.
 */

const SEA_LEVEL_IN_HG = 29.92;
const LAPSE_FACTOR_PER_FT = 6.87535e-6;
const BAROMETRIC_EXPONENT = 5.2561;

/** Standard-atmosphere barometric pressure (in. Hg) at `elevationFt` above sea level. */
export function barometricPressureFromElevation(elevationFt: number): number {
  return SEA_LEVEL_IN_HG * Math.pow(1 - LAPSE_FACTOR_PER_FT * elevationFt, BAROMETRIC_EXPONENT);
}

export function metresToFeet(metres: number): number {
  return metres * 3.28084;
}

export function celsiusToFahrenheit(tempC: number): number {
  return tempC * 9 / 5 + 32;
}
