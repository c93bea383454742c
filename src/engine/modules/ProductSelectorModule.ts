/**
 * ProductSelectorModule
 *
 * Turns scenario results into hardware: guard rails first, then inducer
 * sizing against the fan-curve catalog, supply fan, barometric dampers and the
 * controller that ties the chosen subsystems together.
 */

import type { ComplianceWarning, NoFitError } from '../../contracts/VentingOutputV1';
import type { VentingRequestV1 } from '../schema/VentingInputV1';
import type {
  BarometricDamper,
  InducerOutcome,
  SelectionResult,
  SizingRequirement,
  SupplyFanOutcome,
} from '../schema/SelectionV1';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from '../utils/ventingConstants';
import { selectController } from './ControllerSelectionModule';
import {
  DEFAULT_FAN_CURVE_CATALOG,
  DEFAULT_PRODUCT_LINES,
  type FanCurveCatalog,
  type ProductLines,
} from './FanCurveCatalog';
import { buildGuardRailContext, evaluateGuardRails } from './GuardRailModule';
import { computeSizingRequirement, orderInducerSeries, sizeInducer } from './InducerSizingModule';
import { findScenario, type ScenarioEngineResult } from './ScenarioEngineModule';
import { requiredCombustionAirCfm, selectSupplyFan } from './SupplyFanSelectionModule';

export interface ProductSelectorOptions {
  catalog?: FanCurveCatalog;
  productLines?: ProductLines;
  constants?: VentingConstants;
}

export interface ProductSelectorResult {
  selection: SelectionResult;
  warnings: ComplianceWarning[];
  noFit: NoFitError[];
}

function fmt(value: number): string {
  return value.toFixed(3);
}

export function runProductSelectorV1(
  request: VentingRequestV1,
  scenarios: ScenarioEngineResult,
  options: ProductSelectorOptions = {},
): ProductSelectorResult {
  const catalog = options.catalog ?? DEFAULT_FAN_CURVE_CATALOG;
  const lines = options.productLines ?? DEFAULT_PRODUCT_LINES;
  const c = options.constants ?? DEFAULT_VENTING_CONSTANTS;
  const { worst, outcomes } = scenarios;
  const { preferences } = request;

  const warnings: ComplianceWarning[] = [];
  const noFit: NoFitError[] = [];

  // ── Guard rails ───────────────────────────────────────────────────────────
  const guardRail = evaluateGuardRails(buildGuardRailContext(
    request.appliances.map(a => a.category),
    worst,
    findScenario(outcomes, 'ALL_MINUS_LARGEST'),
    c,
  ));
  const { action } = guardRail;
  const rationale: string[] = guardRail.trail.filter(t => t.matched).map(t => t.rationale);

  // ── Draft inducer ─────────────────────────────────────────────────────────
  const requirement: SizingRequirement = computeSizingRequirement(worst, action.excludeConnectorLoss, c);
  const inducerNeeded = action.poweredInducer === 'required' ||
    (action.poweredInducer === 'by_pressure' && requirement.pressureInWc > 0);

  rationale.push(
    `Sizing point from ${worst.scenario.tag}: ${requirement.cfm.toFixed(1)} cfm at ` +
    `${fmt(requirement.pressureInWc)} in. w.c. rated (${fmt(requirement.pressureAtFlueTempInWc)} at flue temperature` +
    (requirement.excludedConnectorLossInWc > 0 ? `, ${fmt(requirement.excludedConnectorLossInWc)} connector loss excluded` : '') +
    ').',
  );

  let inducer: InducerOutcome;
  if (!inducerNeeded) {
    const reason = action.poweredInducer === 'none'
      ? 'Guard rail rules out a powered inducer.'
      : 'Natural draft covers every scenario.';
    inducer = { kind: 'not_required', requirement, reason };
  } else {
    const ordered = orderInducerSeries(lines, action.seriesFilter, preferences.inducerSeries);
    if (ordered.preferred === 'unknown' || ordered.preferred === 'excluded_by_guard_rail') {
      warnings.push({
        id: 'preferred_series_unavailable',
        severity: 'info',
        title: `Preferred inducer series ${preferences.inducerSeries ?? ''} not used`,
        detail: ordered.preferred === 'unknown'
          ? 'The series is not in the product lines.'
          : `The ${guardRail.ruleId} guard rail excludes it.`,
      });
    }
    inducer = sizeInducer(requirement, ordered.series, catalog);

    const preferredMissed = inducer.kind === 'no_fit' || inducer.seriesId !== preferences.inducerSeries;
    if (ordered.preferred === 'applied' && preferredMissed) {
      rationale.push(`Preferred series ${preferences.inducerSeries ?? ''} had no fit; continued in priority order.`);
    }
    if (inducer.kind === 'selected') {
      rationale.push(
        `Selected ${inducer.modelId}: ${fmt(inducer.pressureAtFlowInWc)} in. w.c. at the sizing flow ` +
        `(margin ${fmt(inducer.marginInWc)}) after ${inducer.candidates.length - 1} smaller or higher-priority candidates were rejected.`,
      );
    } else {
      noFit.push(inducer.error);
      rationale.push(`No inducer in series ${ordered.series.map(s => s.id).join(', ') || '(none eligible)'} clears the sizing point.`);
    }
  }

  // ── Supply fan ────────────────────────────────────────────────────────────
  let supplyFan: SupplyFanOutcome = { kind: 'not_requested' };
  if (preferences.supplyAir) {
    const all = findScenario(outcomes, 'ALL') ?? worst;
    const requiredCfm = requiredCombustionAirCfm(
      all.result.totalMassFlowLbMin,
      request.ambientTempF,
      request.barometricPressureInHg,
      c,
    );
    supplyFan = selectSupplyFan(requiredCfm, lines, catalog);
    if (supplyFan.kind === 'no_fit') noFit.push(supplyFan.error);
    rationale.push(
      supplyFan.kind === 'selected'
        ? `Supply fan ${supplyFan.modelId} (${supplyFan.capacityCfm} cfm) for ${requiredCfm.toFixed(1)} cfm combustion air.`
        : `No supply fan reaches ${requiredCfm.toFixed(1)} cfm combustion air.`,
    );
  }

  // ── Barometric dampers ────────────────────────────────────────────────────
  const barometricDampers: BarometricDamper[] = action.barometricDampers
    ? request.appliances.flatMap((a, applianceIndex) =>
        a.category === 'I' ? [{ applianceIndex, diameterIn: a.outletDiameterIn }] : [])
    : [];

  if (action.poweredInducer === 'none' && worst.result.availableDraftInWc < 0) {
    warnings.push({
      id: 'insufficient_natural_draft',
      severity: 'fail',
      title: 'Natural draft is negative with no inducer offered',
      detail: `${worst.scenario.tag} available draft is ${fmt(worst.result.availableDraftInWc)} in. w.c.`,
      scenario: worst.scenario.tag,
      action: 'Increase vent rise or diameter; barometric dampers cannot create draft.',
    });
  }

  // ── Controller ────────────────────────────────────────────────────────────
  const controller = selectController(
    request.appliances.length,
    {
      poweredInducer: inducerNeeded,
      overdraftControl: action.overdraftControl || preferences.overdraftControl,
      supplyAir: preferences.supplyAir,
    },
    preferences.touchscreen,
  );
  rationale.push(
    controller.kind === 'selected'
      ? `Controller ${controller.model} (${controller.description}).`
      : `No controller: ${controller.reason}`,
  );

  return {
    selection: { guardRail, inducer, controller, supplyFan, barometricDampers, rationale },
    warnings,
    noFit,
  };
}
