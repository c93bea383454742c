/**
 * ScenarioEngineModule
 *
 * Runs the draft calculation once per operating scenario:
 *   ALL               – every appliance firing
 *   ALL_MINUS_LARGEST – turndown: the first highest-input appliance off
 *   SINGLE_LARGEST    – first highest-input appliance alone
 *   SINGLE_SMALLEST   – first lowest-input appliance alone
 *
 * With a manifold, each appliance has its own connector feeding the manifold
 * (the common vent). Without one, the connector is itself the common vent.
 * A scenario's available draft is that of its worst appliance path.
 */

import type { ComplianceWarning } from '../../contracts/VentingOutputV1';
import type {
  ApplianceFlowResult,
  ApplianceSpec,
  CalculationResult,
  OperatingScenario,
  ScenarioOutcome,
  ScenarioTag,
  VentingRequestV1,
} from '../schema/VentingInputV1';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from '../utils/ventingConstants';
import { mixFlows, resolveFlueConditions, runCombustionModuleV1 } from './CombustionModule';
import { analyzeSegment } from './DraftCalculatorModule';
import {
  classifyVelocity,
  co2Warnings,
  hasRatingGaps,
  isWithinCategoryRange,
  outletPressureWarnings,
  velocityWarning,
  ventTypeRatingGaps,
  ventTypeWarnings,
} from './VentComplianceModule';

export const SCENARIO_LABELS: Record<ScenarioTag, string> = {
  ALL: 'All appliances firing',
  ALL_MINUS_LARGEST: 'All except largest (turndown)',
  SINGLE_LARGEST: 'Largest appliance only',
  SINGLE_SMALLEST: 'Smallest appliance only',
};

// ── Scenario resolution ─────────────────────────────────────────────────────

/** Index of the first appliance with the highest (or lowest) input. */
function extremeIndex(appliances: readonly ApplianceSpec[], pick: 'largest' | 'smallest'): number {
  let best = 0;
  for (let i = 1; i < appliances.length; i++) {
    const better = pick === 'largest'
      ? appliances[i].mbh > appliances[best].mbh
      : appliances[i].mbh < appliances[best].mbh;
    if (better) best = i;
  }
  return best;
}

/**
 * Scenarios in tag order. ALL_MINUS_LARGEST is left out for a single
 * appliance because its active set would be empty.
 */
export function resolveScenarios(appliances: readonly ApplianceSpec[]): OperatingScenario[] {
  if (appliances.length === 0) {
    throw new Error('resolveScenarios: at least one appliance is required');
  }
  const all = appliances.map((_, i) => i);
  const largest = extremeIndex(appliances, 'largest');
  const smallest = extremeIndex(appliances, 'smallest');

  const scenarios: OperatingScenario[] = [{ tag: 'ALL', activeIndices: all }];
  if (appliances.length > 1) {
    scenarios.push({ tag: 'ALL_MINUS_LARGEST', activeIndices: all.filter(i => i !== largest) });
  }
  scenarios.push({ tag: 'SINGLE_LARGEST', activeIndices: [largest] });
  scenarios.push({ tag: 'SINGLE_SMALLEST', activeIndices: [smallest] });
  return scenarios;
}

// ── Per-scenario calculation ────────────────────────────────────────────────

export function runScenarioV1(
  request: VentingRequestV1,
  scenario: OperatingScenario,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): CalculationResult {
  const { connector, manifold, ambientTempF, barometricPressureInHg } = request;
  const active = scenario.activeIndices.map(index => {
    const spec = request.appliances[index];
    return {
      index,
      spec,
      conditions: resolveFlueConditions(spec, c),
      combustion: runCombustionModuleV1(spec, barometricPressureInHg, c),
    };
  });
  if (active.length === 0) {
    throw new Error(`runScenarioV1: scenario ${scenario.tag} has no active appliances`);
  }

  const mixed = mixFlows(
    active.map(a => ({ massFlowLbMin: a.combustion.massFlowLbMin, cfm: a.combustion.cfm, flueTempF: a.conditions.flueTempF })),
    c,
  );

  const commonVent = analyzeSegment({
    segment: manifold ?? connector,
    role: 'common_vent',
    cfm: mixed.totalCfm,
    gasTempF: mixed.mixedTempF,
    ambientTempF,
    barometricPressureInHg,
    implicit: { entrance: manifold === undefined, exit: true },
  }, c);

  const appliances: ApplianceFlowResult[] = active.map(a => {
    const connectorAnalysis = manifold
      ? analyzeSegment({
          segment: connector,
          role: 'connector',
          cfm: a.combustion.cfm,
          gasTempF: a.conditions.flueTempF,
          ambientTempF,
          barometricPressureInHg,
          implicit: { entrance: true, exit: false },
        }, c)
      : null;
    const pathAvailableDraftInWc = (connectorAnalysis?.availableDraftInWc ?? 0) + commonVent.availableDraftInWc;
    const outletPressureInWc = -pathAvailableDraftInWc;
    return {
      index: a.index,
      category: a.spec.category,
      mbh: a.spec.mbh,
      co2Pct: a.conditions.co2Pct,
      flueTempF: a.conditions.flueTempF,
      combustion: a.combustion,
      connector: connectorAnalysis,
      pathAvailableDraftInWc,
      outletPressureInWc,
      withinCategoryLimits: isWithinCategoryRange(a.spec.category, outletPressureInWc, c),
    };
  });

  let worst = appliances[0];
  for (const a of appliances) {
    if (a.pathAvailableDraftInWc < worst.pathAvailableDraftInWc) worst = a;
  }

  const connectorLoss = worst.connector?.loss.totalInWc ?? 0;
  const activeSpecs = active.map(a => a.spec);
  const ventTypeRated = !hasRatingGaps(ventTypeRatingGaps(connector, activeSpecs, c)) &&
    (manifold === undefined || !hasRatingGaps(ventTypeRatingGaps(manifold, activeSpecs, c)));

  return {
    appliances,
    aggregateCfm: mixed.totalCfm,
    totalMassFlowLbMin: mixed.totalMassFlowLbMin,
    mixedFlueTempF: mixed.mixedTempF,
    commonVent,
    velocityFpm: commonVent.velocityFpm,
    worstApplianceIndex: worst.index,
    theoreticalDraftInWc: (worst.connector?.theoreticalDraftInWc ?? 0) + commonVent.theoreticalDraftInWc,
    pressureLoss: {
      connectorInWc: connectorLoss,
      commonVentInWc: commonVent.loss.totalInWc,
      totalInWc: connectorLoss + commonVent.loss.totalInWc,
    },
    availableDraftInWc: worst.pathAvailableDraftInWc,
    outletPressureInWc: worst.outletPressureInWc,
    compliance: {
      velocityBand: classifyVelocity(commonVent.velocityFpm, c),
      ventTypeRated,
      outletPressureWithinLimits: appliances.every(a => a.withinCategoryLimits),
    },
  };
}

// ── All scenarios ───────────────────────────────────────────────────────────

export interface ScenarioEngineResult {
  outcomes: ScenarioOutcome[];
  worst: ScenarioOutcome;
  warnings: ComplianceWarning[];
}

/** Lowest available draft; ties keep the earlier scenario in tag order. */
export function findWorstCase(outcomes: readonly ScenarioOutcome[]): ScenarioOutcome {
  if (outcomes.length === 0) {
    throw new Error('findWorstCase: no scenario outcomes');
  }
  let worst = outcomes[0];
  for (const o of outcomes) {
    if (o.result.availableDraftInWc < worst.result.availableDraftInWc) worst = o;
  }
  return worst;
}

export function findScenario(outcomes: readonly ScenarioOutcome[], tag: ScenarioTag): ScenarioOutcome | undefined {
  return outcomes.find(o => o.scenario.tag === tag);
}

export function runScenarioEngineV1(
  request: VentingRequestV1,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): ScenarioEngineResult {
  const outcomes = resolveScenarios(request.appliances).map(scenario => ({ scenario, result: runScenarioV1(request, scenario, c) }));
  const worst = findWorstCase(outcomes);

  const warnings: ComplianceWarning[] = [
    ...ventTypeWarnings('connector', request.connector, request.appliances, c),
    ...(request.manifold ? ventTypeWarnings('manifold', request.manifold, request.appliances, c) : []),
    ...outcomes.flatMap(o => {
      const w = velocityWarning(o.scenario.tag, o.result.velocityFpm, c);
      return w ? [w] : [];
    }),
    ...outletPressureWarnings(worst, c),
    ...co2Warnings(request.appliances, c),
  ];

  return { outcomes, worst, warnings };
}
