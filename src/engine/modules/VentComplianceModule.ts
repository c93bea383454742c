import type { ComplianceWarning } from '../../contracts/VentingOutputV1';
import type {
  ApplianceCategory,
  ApplianceSpec,
  FuelType,
  ScenarioOutcome,
  ScenarioTag,
  VelocityBand,
  VentSegment,
} from '../schema/VentingInputV1';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from '../utils/ventingConstants';

export function classifyVelocity(fpm: number, c: VentingConstants = DEFAULT_VENTING_CONSTANTS): VelocityBand {
  if (fpm < c.velocityBandFpm.min) return 'low';
  if (fpm > c.velocityBandFpm.max) return 'high';
  return 'ok';
}

export function isWithinCategoryRange(
  category: ApplianceCategory,
  outletPressureInWc: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): boolean {
  const [min, max] = c.categories[category].outletPressureRangeInWc;
  return outletPressureInWc >= min && outletPressureInWc <= max;
}

export interface RatingGaps {
  categories: ApplianceCategory[];
  fuels: FuelType[];
}

/** Categories and fuels present in `appliances` that `segment`'s vent type is not listed for. */
export function ventTypeRatingGaps(
  segment: VentSegment,
  appliances: readonly ApplianceSpec[],
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): RatingGaps {
  const table = c.ventTypes[segment.ventType];
  const categories = [...new Set(appliances.map(a => a.category))]
    .filter(cat => !table.ratedCategories.includes(cat));
  const fuels = [...new Set(appliances.map(a => a.fuel))]
    .filter(fuel => !table.ratedFuels.includes(fuel));
  return { categories, fuels };
}

export function hasRatingGaps(gaps: RatingGaps): boolean {
  return gaps.categories.length > 0 || gaps.fuels.length > 0;
}

// ── Warnings ────────────────────────────────────────────────────────────────

export function velocityWarning(
  scenario: ScenarioTag,
  fpm: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): ComplianceWarning | null {
  const band = classifyVelocity(fpm, c);
  const { min, max } = c.velocityBandFpm;
  if (band === 'low') {
    return {
      id: 'velocity_low',
      severity: 'warn',
      title: 'Common vent velocity below recommended band',
      detail: `${fpm.toFixed(0)} ft/min in ${scenario} is under ${min} ft/min. Slow flue gas cools and condensate can pool instead of draining.`,
      scenario,
      action: 'Reduce the common vent diameter or confirm the vent is pitched to drain.',
    };
  }
  if (band === 'high') {
    return {
      id: 'velocity_high',
      severity: 'warn',
      title: 'Common vent velocity above recommended band',
      detail: `${fpm.toFixed(0)} ft/min in ${scenario} exceeds ${max} ft/min, risking noise and liner erosion.`,
      scenario,
      action: 'Increase the common vent diameter.',
    };
  }
  return null;
}

export function ventTypeWarnings(
  segmentName: 'connector' | 'manifold',
  segment: VentSegment,
  appliances: readonly ApplianceSpec[],
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): ComplianceWarning[] {
  const gaps = ventTypeRatingGaps(segment, appliances, c);
  const label = c.ventTypes[segment.ventType].label;
  const warnings: ComplianceWarning[] = [];

  if (gaps.categories.length > 0) {
    warnings.push({
      id: 'vent_type_category',
      severity: 'fail',
      title: `${label} not rated for Category ${gaps.categories.join(', ')}`,
      detail: `The ${segmentName} vent type is listed for Category ${c.ventTypes[segment.ventType].ratedCategories.join(', ')} only.`,
      action: 'Use a vent system listed for every appliance category on this ' + segmentName + '.',
    });
  }
  if (gaps.fuels.length > 0) {
    warnings.push({
      id: 'vent_type_fuel',
      severity: 'fail',
      title: `${label} not rated for ${gaps.fuels.map(f => c.fuels[f].label).join(', ')}`,
      detail: `The ${segmentName} vent type is not listed for every fuel connected to it.`,
      action: 'Use a vent system listed for the fuel, e.g. a UL103 chimney for oil.',
    });
  }
  return warnings;
}

/** Measured CO₂ outside the fuel's normal operating window (info only). Category defaults are not checked. */
export function co2Warnings(
  appliances: readonly ApplianceSpec[],
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): ComplianceWarning[] {
  return appliances.flatMap((appliance, index) => {
    const { co2Pct } = appliance;
    if (co2Pct === undefined) return [];
    const [lo, hi] = c.fuels[appliance.fuel].typicalCo2RangePct;
    if (co2Pct >= lo && co2Pct <= hi) return [];
    const warning: ComplianceWarning = {
      id: 'co2_outside_typical',
      severity: 'info',
      title: `Appliance ${index + 1}: CO₂ ${co2Pct}% outside typical ${lo}–${hi}%`,
      detail: 'Flue volume is derived from CO₂; confirm the value with a combustion analyser reading.',
    };
    return [warning];
  });
}

/** Appliances whose outlet pressure falls outside their category range in `outcome`. */
export function outletPressureWarnings(
  outcome: ScenarioOutcome,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): ComplianceWarning[] {
  return outcome.result.appliances
    .filter(a => !a.withinCategoryLimits)
    .map((a): ComplianceWarning => {
      const [min, max] = c.categories[a.category].outletPressureRangeInWc;
      return {
        id: 'outlet_pressure_range',
        severity: 'warn',
        title: `Appliance ${a.index + 1} outlet pressure outside Category ${a.category} range`,
        detail: `${a.outletPressureInWc.toFixed(3)} in. w.c. vs allowed ${min} to ${max} in. w.c.`,
        scenario: outcome.scenario.tag,
        action: 'Adjust vent sizing or add draft control.',
      };
    });
}
