import type {
  ComplianceWarning,
  FanCurvePlotV1,
  NoFitError,
  PlotPoint,
  RecommendationV1,
  ScenarioRowV1,
  SeasonalDraftV1,
  VentingOutputV1,
} from '../contracts/VentingOutputV1';
import { CONSTANTS_VERSION, CONTRACT_VERSION, ENGINE_VERSION } from '../contracts/versions';
import type { VentingRequestV1 } from './schema/VentingInputV1';
import type { SelectionResult } from './schema/SelectionV1';
import type { DiameterAdvice } from './modules/DraftCalculatorModule';
import { findScenario, SCENARIO_LABELS, type ScenarioEngineResult } from './modules/ScenarioEngineModule';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from './utils/ventingConstants';

/** Everything the engine computed, before shaping for report collaborators. */
export interface VentingEngineCore {
  request: VentingRequestV1;
  calculation: ScenarioEngineResult;
  selection: SelectionResult;
  warnings: ComplianceWarning[];
  noFit: NoFitError[];
  diameterAdvice: DiameterAdvice | null;
}

const SYSTEM_CURVE_POINTS = 12;

function fmt(value: number, digits = 3): string {
  return value.toFixed(digits);
}

function buildScenarioRows(core: VentingEngineCore): ScenarioRowV1[] {
  const { outcomes, worst } = core.calculation;
  return outcomes.map(({ scenario, result }) => ({
    tag: scenario.tag,
    label: SCENARIO_LABELS[scenario.tag],
    activeIndices: scenario.activeIndices,
    aggregateCfm: result.aggregateCfm,
    mixedFlueTempF: result.mixedFlueTempF,
    velocityFpm: result.velocityFpm,
    velocityBand: result.compliance.velocityBand,
    theoreticalDraftInWc: result.theoreticalDraftInWc,
    pressureLossInWc: result.pressureLoss.totalInWc,
    availableDraftInWc: result.availableDraftInWc,
    outletPressureInWc: result.outletPressureInWc,
    isWorstCase: scenario.tag === worst.scenario.tag,
  }));
}

/**
 * Fan curve, system curve P = k × Q² through the design point, and the design
 * point itself. Null when no inducer was selected.
 */
export function buildFanCurvePlot(selection: SelectionResult): FanCurvePlotV1 | null {
  const { inducer } = selection;
  if (inducer.kind !== 'selected') return null;

  const { cfm, pressureInWc } = inducer.requirement;
  const k = cfm > 0 ? pressureInWc / (cfm * cfm) : 0;
  const maxFlow = inducer.curve.domain.maxFlowCfm;
  const systemCurve: PlotPoint[] = Array.from({ length: SYSTEM_CURVE_POINTS + 1 }, (_, i) => {
    const flowCfm = (maxFlow * i) / SYSTEM_CURVE_POINTS;
    return { flowCfm, pressureInWc: k * flowCfm * flowCfm };
  });

  return {
    modelId: inducer.modelId,
    curve: inducer.curve.samples.map(s => ({ flowCfm: s.flowCfm, pressureInWc: s.pressureInWc })),
    systemCurve,
    systemCoefficient: k,
    designPoint: { flowCfm: cfm, pressureInWc },
    fanPressureAtDesignInWc: inducer.pressureAtFlowInWc,
  };
}

function buildRecommendations(core: VentingEngineCore, c: VentingConstants): RecommendationV1[] {
  const { selection, calculation, diameterAdvice } = core;
  const recs: RecommendationV1[] = [];
  const { inducer, controller, supplyFan, barometricDampers } = selection;

  if (inducer.kind === 'selected') {
    recs.push({
      id: 'draft_inducer',
      title: `Draft inducer ${inducer.modelId}`,
      detail: `Delivers ${fmt(inducer.pressureAtFlowInWc)} in. w.c. at ${fmt(inducer.requirement.cfm, 1)} cfm ` +
        `against ${fmt(inducer.requirement.pressureInWc)} required.`,
    });
  }
  if (barometricDampers.length > 0) {
    recs.push({
      id: 'barometric_dampers',
      title: `${barometricDampers.length} barometric damper${barometricDampers.length === 1 ? '' : 's'}`,
      detail: barometricDampers.map(d => `Appliance ${d.applianceIndex + 1}: ${d.diameterIn}" damper`).join('; '),
    });
  }
  if (supplyFan.kind === 'selected') {
    recs.push({
      id: 'supply_fan',
      title: `Supply-air fan ${supplyFan.modelId}`,
      detail: `${supplyFan.capacityCfm} cfm capacity for ${fmt(supplyFan.requiredCfm, 1)} cfm combustion air.`,
    });
  }
  if (controller.kind === 'selected') {
    recs.push({ id: 'controller', title: `Controller ${controller.model}`, detail: controller.description });
  }

  const worstAvailable = calculation.worst.result.availableDraftInWc;
  const deficit = -worstAvailable;
  if (deficit > c.recommendations.maxInducerDeficitInWc) {
    recs.push({
      id: 'reduce_system_resistance',
      title: 'Reduce vent resistance',
      detail: `Draft deficit of ${fmt(deficit)} in. w.c. exceeds ${c.recommendations.maxInducerDeficitInWc} in. w.c.; ` +
        'increase diameter, shorten the run or remove fittings.',
    });
  }

  const peakDraft = Math.max(...calculation.outcomes.map(o => o.result.availableDraftInWc));
  if (peakDraft > c.recommendations.excessiveDraftInWc && !(controller.kind === 'selected' && controller.subsystems.overdraftControl)) {
    recs.push({
      id: 'overdraft_control',
      title: 'Consider overdraft control',
      detail: `Available draft reaches ${fmt(peakDraft)} in. w.c.; a draft regulator keeps appliances inside their limits.`,
    });
  }

  if (diameterAdvice?.kind === 'fit') {
    recs.push({
      id: 'vent_diameter',
      title: `Common vent ${diameterAdvice.diameterIn}" diameter`,
      detail: `Smallest standard diameter reaching ${c.minAvailableDraftInWc} in. w.c. natural draft ` +
        `(common vent ${fmt(diameterAdvice.analysis.availableDraftInWc)} in. w.c. in the worst case).`,
    });
  }

  return recs;
}

function buildSeasonalDraft(core: VentingEngineCore, c: VentingConstants): SeasonalDraftV1 {
  const all = findScenario(core.calculation.outcomes, 'ALL') ?? core.calculation.worst;
  const designInWc = all.result.commonVent.availableDraftInWc;
  return {
    designInWc,
    winterInWc: designInWc * c.seasonalDraftFactors.winter,
    summerInWc: designInWc * c.seasonalDraftFactors.summer,
  };
}

function buildHeadline(core: VentingEngineCore): string {
  const { worst } = core.calculation;
  const { inducer } = core.selection;
  const draft = `${SCENARIO_LABELS[worst.scenario.tag]}: ${fmt(worst.result.availableDraftInWc)} in. w.c. available draft`;
  if (inducer.kind === 'selected') return `${draft}; draft inducer ${inducer.modelId}.`;
  if (inducer.kind === 'no_fit') return `${draft}; no catalog inducer fits.`;
  return `${draft}; natural draft.`;
}

export function buildVentingOutputV1(
  core: VentingEngineCore,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): VentingOutputV1 {
  const { worst } = core.calculation;
  const blocking = core.warnings.some(w => w.severity !== 'info');

  return {
    meta: { engineVersion: ENGINE_VERSION, contractVersion: CONTRACT_VERSION, constantsVersion: CONSTANTS_VERSION },
    status: core.noFit.length > 0 ? 'no_fit' : blocking ? 'warn' : 'ok',
    headline: buildHeadline(core),
    worstScenario: worst.scenario.tag,
    scenarios: buildScenarioRows(core),
    rationale: core.selection.rationale,
    recommendations: buildRecommendations(core, c),
    warnings: core.warnings,
    noFit: core.noFit,
    fanCurvePlot: buildFanCurvePlot(core.selection),
    velocityBand: {
      velocityFpm: worst.result.velocityFpm,
      minFpm: c.velocityBandFpm.min,
      maxFpm: c.velocityBandFpm.max,
      band: worst.result.compliance.velocityBand,
    },
    seasonalDraft: buildSeasonalDraft(core, c),
  };
}
