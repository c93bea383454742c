import type { SupplyFanOutcome } from '../schema/SelectionV1';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from '../utils/ventingConstants';
import { gasDensity } from './CombustionModule';
import { curvesByCapacity, nominalCapacityCfm, type FanCurveCatalog, type ProductLines } from './FanCurveCatalog';

/**
 * Combustion air (CFM) to replace the flue products of every appliance firing,
 * at ambient temperature: total mass flow / ambient air density.
 */
export function requiredCombustionAirCfm(
  totalMassFlowLbMin: number,
  ambientTempF: number,
  barometricPressureInHg: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): number {
  return totalMassFlowLbMin / gasDensity(ambientTempF, barometricPressureInHg, c);
}

/** Smallest supply fan whose maximum rated flow covers `requiredCfm`. */
export function selectSupplyFan(
  requiredCfm: number,
  lines: ProductLines,
  catalog: FanCurveCatalog,
): SupplyFanOutcome {
  const curves = curvesByCapacity(catalog, lines.supplyFans.models);
  const fit = curves.find(curve => nominalCapacityCfm(curve) >= requiredCfm);
  if (fit) {
    return {
      kind: 'selected',
      modelId: fit.modelId,
      curve: fit,
      requiredCfm,
      capacityCfm: nominalCapacityCfm(fit),
    };
  }

  return {
    kind: 'no_fit',
    requiredCfm,
    error: {
      kind: 'no_fit',
      subject: 'supply_fan',
      requiredCfm,
      seriesConsidered: [lines.supplyFans.id],
      candidates: curves.map(curve => ({
        seriesId: lines.supplyFans.id,
        modelId: curve.modelId,
        nominalCapacityCfm: nominalCapacityCfm(curve),
        reason: `max ${nominalCapacityCfm(curve)} cfm < ${requiredCfm.toFixed(1)} cfm required`,
      })),
    },
  };
}
