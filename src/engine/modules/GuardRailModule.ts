/**
 * GuardRailModule
 *
 * Ordered rule table evaluated before any sizing. The first matching rule
 * decides the action; later rules are not evaluated. When nothing matches,
 * the default action offers an inducer only if the sizing pressure is positive.
 *
 * Rules are plain records so precedence is visible in the array order and each
 * predicate can be tested on its own.
 */

import type { ApplianceCategory, ApplianceFlowResult, ScenarioOutcome } from '../schema/VentingInputV1';
import type {
  GuardRailAction,
  GuardRailDecision,
  GuardRailRuleId,
  GuardRailTrailEntry,
} from '../schema/SelectionV1';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from '../utils/ventingConstants';

export interface GuardRailContext {
  /** Category of every appliance in the system. */
  categories: readonly ApplianceCategory[];
  worst: ScenarioOutcome;
  /** ALL_MINUS_LARGEST outcome; absent for single-appliance systems. */
  turndown?: ScenarioOutcome;
  /** Pressure the inducer must add before any connector-loss exclusion (in. w.c.). */
  sizingPressureInWc: number;
  constants: VentingConstants;
}

export interface GuardRailRule {
  id: GuardRailRuleId;
  predicate: (ctx: GuardRailContext) => boolean;
  action: GuardRailAction;
  rationale: (ctx: GuardRailContext) => string;
}

const NO_CHANGE: GuardRailAction = {
  poweredInducer: 'by_pressure',
  seriesFilter: 'any',
  excludeConnectorLoss: false,
  barometricDampers: false,
  overdraftControl: false,
};

const allCategory = (ctx: GuardRailContext, category: ApplianceCategory): boolean =>
  ctx.categories.every(c => c === category);

/** |worst-case available draft|, compared against the Category IV threshold. */
export function operatingPressureMagnitude(ctx: GuardRailContext): number {
  return Math.abs(ctx.worst.result.availableDraftInWc);
}

/** Turndown appliance with the most draft (lowest outlet pressure); ties go to the first. */
export function turndownPeakDraftAppliance(ctx: GuardRailContext): ApplianceFlowResult | undefined {
  if (!ctx.turndown) return undefined;
  return ctx.turndown.result.appliances.reduce<ApplianceFlowResult | undefined>(
    (best, a) => (best === undefined || a.outletPressureInWc < best.outletPressureInWc ? a : best),
    undefined,
  );
}

/** Overdraft only: outlet pressure below the category minimum. A starved turndown does not count. */
function turndownOverdraft(ctx: GuardRailContext): boolean {
  const appliance = turndownPeakDraftAppliance(ctx);
  if (!appliance) return false;
  const [min] = ctx.constants.categories[appliance.category].outletPressureRangeInWc;
  return appliance.outletPressureInWc < min;
}

export const GUARD_RAIL_RULES: readonly GuardRailRule[] = [
  {
    id: 'mixed-categories',
    predicate: ctx => new Set(ctx.categories).size > 1,
    action: { ...NO_CHANGE, poweredInducer: 'required' },
    rationale: ctx =>
      `Mixed appliance categories (${[...new Set(ctx.categories)].join(', ')}) share one vent; ` +
      'a powered inducer is mandatory whatever the pressure margin.',
  },
  {
    id: 'category-iv-low-pressure',
    predicate: ctx =>
      allCategory(ctx, 'IV') &&
      operatingPressureMagnitude(ctx) < ctx.constants.guardRails.categoryIvPressureThresholdInWc,
    action: { ...NO_CHANGE, poweredInducer: 'required', seriesFilter: 'condensing_rated' },
    rationale: ctx =>
      `All Category IV with operating pressure ${operatingPressureMagnitude(ctx).toFixed(3)} in. w.c. ` +
      `below ${ctx.constants.guardRails.categoryIvPressureThresholdInWc}; only condensing-rated inducers are offered.`,
  },
  {
    id: 'category-iv-positive-pressure',
    predicate: ctx =>
      allCategory(ctx, 'IV') &&
      operatingPressureMagnitude(ctx) >= ctx.constants.guardRails.categoryIvPressureThresholdInWc,
    action: { ...NO_CHANGE, poweredInducer: 'required', excludeConnectorLoss: true },
    rationale: ctx =>
      `All Category IV with operating pressure ${operatingPressureMagnitude(ctx).toFixed(3)} in. w.c. ` +
      `at or above ${ctx.constants.guardRails.categoryIvPressureThresholdInWc}; ` +
      'the appliance blowers overcome connector loss, so it is excluded from sizing.',
  },
  {
    id: 'category-i-barometric',
    predicate: ctx => allCategory(ctx, 'I'),
    action: { ...NO_CHANGE, poweredInducer: 'none', barometricDampers: true },
    rationale: () =>
      'All Category I; a barometric damper on each appliance regulates draft and no powered inducer is offered.',
  },
  {
    id: 'turndown-overdraft',
    predicate: turndownOverdraft,
    action: { ...NO_CHANGE, poweredInducer: 'required', seriesFilter: 'variable_speed', overdraftControl: true },
    rationale: ctx => {
      const appliance = turndownPeakDraftAppliance(ctx);
      const pressure = appliance?.outletPressureInWc ?? 0;
      const min = appliance ? ctx.constants.categories[appliance.category].outletPressureRangeInWc[0] : 0;
      return `Turndown outlet pressure ${pressure.toFixed(3)} in. w.c. is below the ${min} in. w.c. category minimum; ` +
        'a fixed-speed inducer cannot hold it, so variable speed with overdraft control is required.';
    },
  },
];

/** First-match evaluation. The trail lists every rule checked, in order, up to the match. */
export function evaluateGuardRails(
  ctx: GuardRailContext,
  rules: readonly GuardRailRule[] = GUARD_RAIL_RULES,
): GuardRailDecision {
  const trail: GuardRailTrailEntry[] = [];

  for (const rule of rules) {
    if (rule.predicate(ctx)) {
      const rationale = rule.rationale(ctx);
      trail.push({ ruleId: rule.id, matched: true, rationale });
      return { ruleId: rule.id, forced: true, action: rule.action, rationale, trail };
    }
    trail.push({ ruleId: rule.id, matched: false, rationale: `${rule.id}: not applicable` });
  }

  const rationale = ctx.sizingPressureInWc > 0
    ? `No guard rail applies; natural draft falls short by ${ctx.sizingPressureInWc.toFixed(3)} in. w.c., so an inducer is sized.`
    : 'No guard rail applies; natural draft is sufficient and no inducer is required.';
  trail.push({ ruleId: 'default', matched: true, rationale });
  return { ruleId: 'default', forced: false, action: NO_CHANGE, rationale, trail };
}

export function buildGuardRailContext(
  categories: readonly ApplianceCategory[],
  worst: ScenarioOutcome,
  turndown: ScenarioOutcome | undefined,
  constants: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): GuardRailContext {
  return {
    categories,
    worst,
    turndown,
    sizingPressureInWc: Math.max(0, -worst.result.availableDraftInWc),
    constants,
  };
}
