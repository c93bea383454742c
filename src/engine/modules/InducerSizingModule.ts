import type { NoFitError } from '../../contracts/VentingOutputV1';
import type { ScenarioOutcome } from '../schema/VentingInputV1';
import type {
  CandidateEvaluation,
  InducerOutcome,
  InducerSeriesFilter,
  SizingRequirement,
} from '../schema/SelectionV1';
import { interpolateCurve } from '../utils/curveInterpolation';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from '../utils/ventingConstants';
import { toRankine } from './CombustionModule';
import {
  curvesByCapacity,
  nominalCapacityCfm,
  type FanCurveCatalog,
  type InducerSeries,
  type ProductLines,
} from './FanCurveCatalog';

// ── Requirement ─────────────────────────────────────────────────────────────

/**
 * Flow and pressure the inducer must deliver for the worst-case scenario.
 *
 * Pressure = max(0, −(available draft + excluded connector loss)), then scaled
 * to the fan rating temperature: hot flue gas is lighter than rating air, so a
 * fan develops less pressure in it and the rated requirement goes up by
 * T_R(flue) / T_R(rating).
 */
export function computeSizingRequirement(
  worst: ScenarioOutcome,
  excludeConnectorLoss: boolean,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): SizingRequirement {
  const { result } = worst;
  const excludedConnectorLossInWc = excludeConnectorLoss ? result.pressureLoss.connectorInWc : 0;
  const pressureAtFlueTempInWc = Math.max(0, -(result.availableDraftInWc + excludedConnectorLossInWc));
  const densityCorrection = toRankine(result.mixedFlueTempF, c) / toRankine(c.physical.fanRatingTempF, c);

  return {
    cfm: result.aggregateCfm,
    pressureInWc: pressureAtFlueTempInWc * densityCorrection,
    pressureAtFlueTempInWc,
    excludedConnectorLossInWc,
    densityCorrection,
  };
}

// ── Series order ────────────────────────────────────────────────────────────

export type PreferredSeriesStatus = 'none' | 'applied' | 'unknown' | 'excluded_by_guard_rail';

export function seriesMatchesFilter(series: InducerSeries, filter: InducerSeriesFilter): boolean {
  if (filter === 'condensing_rated') return series.condensingRated;
  if (filter === 'variable_speed') return series.variableSpeed;
  return true;
}

/**
 * Series to try, in order: the preferred series first when it exists and
 * passes the guard-rail filter, then the rest by priority.
 */
export function orderInducerSeries(
  lines: ProductLines,
  filter: InducerSeriesFilter,
  preferredSeriesId?: string,
): { series: InducerSeries[]; preferred: PreferredSeriesStatus } {
  const eligible = lines.inducerSeries.filter(s => seriesMatchesFilter(s, filter));
  if (preferredSeriesId === undefined) return { series: eligible, preferred: 'none' };

  const preferred = eligible.find(s => s.id === preferredSeriesId);
  if (!preferred) {
    const known = lines.inducerSeries.some(s => s.id === preferredSeriesId);
    return { series: eligible, preferred: known ? 'excluded_by_guard_rail' : 'unknown' };
  }
  return { series: [preferred, ...eligible.filter(s => s !== preferred)], preferred: 'applied' };
}

// ── Sizing ──────────────────────────────────────────────────────────────────

function fmt(value: number, digits = 3): string {
  return value.toFixed(digits);
}

/**
 * Walk series in the given order and models by ascending capacity; the first
 * model whose curve covers the required flow with enough pressure wins.
 * Curves are never extrapolated.
 */
export function sizeInducer(
  requirement: SizingRequirement,
  series: readonly InducerSeries[],
  catalog: FanCurveCatalog,
): Exclude<InducerOutcome, { kind: 'not_required' }> {
  const candidates: CandidateEvaluation[] = [];

  for (const s of series) {
    for (const curve of curvesByCapacity(catalog, s.models)) {
      const base = { seriesId: s.id, modelId: curve.modelId, nominalCapacityCfm: nominalCapacityCfm(curve) };
      const point = interpolateCurve(curve.samples, requirement.cfm);

      if (point.kind !== 'in_domain') {
        const { minFlowCfm, maxFlowCfm } = point.domain;
        candidates.push({
          ...base,
          outcome: point.kind,
          pressureAtFlowInWc: null,
          reason: `${fmt(requirement.cfm, 1)} cfm outside sampled range ${minFlowCfm}–${maxFlowCfm} cfm`,
        });
        continue;
      }

      if (point.pressureInWc < requirement.pressureInWc) {
        candidates.push({
          ...base,
          outcome: 'insufficient_pressure',
          pressureAtFlowInWc: point.pressureInWc,
          reason: `${fmt(point.pressureInWc)} in. w.c. at ${fmt(requirement.cfm, 1)} cfm is below ${fmt(requirement.pressureInWc)} required`,
        });
        continue;
      }

      candidates.push({
        ...base,
        outcome: 'accepted',
        pressureAtFlowInWc: point.pressureInWc,
        reason: `${fmt(point.pressureInWc)} in. w.c. at ${fmt(requirement.cfm, 1)} cfm meets ${fmt(requirement.pressureInWc)} required`,
      });
      return {
        kind: 'selected',
        seriesId: s.id,
        modelId: curve.modelId,
        curve,
        requirement,
        pressureAtFlowInWc: point.pressureInWc,
        marginInWc: point.pressureInWc - requirement.pressureInWc,
        candidates,
      };
    }
  }

  const error: NoFitError = {
    kind: 'no_fit',
    subject: 'draft_inducer',
    requiredCfm: requirement.cfm,
    requiredPressureInWc: requirement.pressureInWc,
    seriesConsidered: series.map(s => s.id),
    candidates: candidates.map(({ seriesId, modelId, nominalCapacityCfm: cap, reason }) => ({
      seriesId,
      modelId,
      nominalCapacityCfm: cap,
      reason,
    })),
  };
  return { kind: 'no_fit', requirement, error, candidates };
}
