import type {
  ApplianceSpec,
  CombustionResult,
  FuelType,
  MixedFlowResult,
} from '../schema/VentingInputV1';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from '../utils/ventingConstants';

/** °F → °R */
export function toRankine(tempF: number, c: VentingConstants = DEFAULT_VENTING_CONSTANTS): number {
  return tempF + c.physical.rankineOffset;
}

/**
 * Ideal-gas density (lb/ft³) of air-like flue products.
 * ρ = P / (R × T_R), P = 2116.2 lbf/ft² scaled by barometric pressure.
 */
export function gasDensity(
  tempF: number,
  barometricPressureInHg: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): number {
  const { standardAtmospherePsf, standardBarometricInHg, gasConstantAir } = c.physical;
  const pressurePsf = standardAtmospherePsf * (barometricPressureInHg / standardBarometricInHg);
  return pressurePsf / (gasConstantAir * toRankine(tempF, c));
}

/**
 * Pounds of combustion products per 1000 BTU fired.
 * M = scale × (base + co2Coefficient / CO₂%). Lower CO₂ → more excess air → higher M.
 */
export function combustionMassFactor(
  fuel: FuelType,
  co2Pct: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): number {
  const f = c.fuels[fuel];
  return f.scale * (f.base + f.co2Coefficient / co2Pct);
}

/** Excess air (%) = (stoichiometric CO₂ / measured CO₂ − 1) × 100 */
export function excessAirPct(
  fuel: FuelType,
  co2Pct: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): number {
  return (c.fuels[fuel].stoichiometricCo2Pct / co2Pct - 1) * 100;
}

/** CO₂ and flue temperature actually used: explicit overrides, else category defaults. */
export function resolveFlueConditions(
  appliance: ApplianceSpec,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): { co2Pct: number; flueTempF: number } {
  const defaults = c.categories[appliance.category];
  return {
    co2Pct: appliance.co2Pct ?? defaults.co2Pct,
    flueTempF: appliance.flueTempF ?? defaults.flueTempF,
  };
}

/**
 * Flue-gas production for one appliance: mass flow from the fuel's mass factor,
 * then volume flow at the flue temperature.
 */
export function runCombustionModuleV1(
  appliance: ApplianceSpec,
  barometricPressureInHg: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): CombustionResult {
  const { co2Pct, flueTempF } = resolveFlueConditions(appliance, c);
  const massFactor = combustionMassFactor(appliance.fuel, co2Pct, c);
  const massFlowLbHr = massFactor * appliance.mbh;
  const massFlowLbMin = massFlowLbHr / 60;
  const densityLbFt3 = gasDensity(flueTempF, barometricPressureInHg, c);

  return {
    massFactor,
    massFlowLbHr,
    massFlowLbMin,
    densityLbFt3,
    cfm: massFlowLbMin / densityLbFt3,
    excessAirPct: excessAirPct(appliance.fuel, co2Pct, c),
  };
}

export interface FlowStream {
  massFlowLbMin: number;
  cfm: number;
  flueTempF: number;
}

/**
 * Combine streams entering a common vent. The mixed temperature is the
 * mass-weighted mean of absolute temperatures, which keeps total volume
 * equal to the sum of the individual volumes.
 */
export function mixFlows(
  streams: readonly FlowStream[],
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): MixedFlowResult {
  if (streams.length === 0) {
    throw new Error('mixFlows: at least one stream is required');
  }
  const totalMassFlowLbMin = streams.reduce((sum, s) => sum + s.massFlowLbMin, 0);
  const weightedRankine = streams.reduce((sum, s) => sum + s.massFlowLbMin * toRankine(s.flueTempF, c), 0);

  return {
    totalCfm: streams.reduce((sum, s) => sum + s.cfm, 0),
    totalMassFlowLbMin,
    mixedTempF: weightedRankine / totalMassFlowLbMin - c.physical.rankineOffset,
  };
}
