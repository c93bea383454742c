import type { NoFitError } from '../../contracts/VentingOutputV1';
import type { FanCurve } from '../modules/FanCurveCatalog';

// ─── Guard rails ──────────────────────────────────────────────────────────────

export type GuardRailRuleId =
  | 'mixed-categories'
  | 'category-iv-low-pressure'
  | 'category-iv-positive-pressure'
  | 'category-i-barometric'
  | 'turndown-overdraft';

export type InducerSeriesFilter = 'any' | 'condensing_rated' | 'variable_speed';

export interface GuardRailAction {
  /** 'by_pressure': only when the sizing pressure is positive. */
  poweredInducer: 'required' | 'none' | 'by_pressure';
  seriesFilter: InducerSeriesFilter;
  excludeConnectorLoss: boolean;
  barometricDampers: boolean;
  overdraftControl: boolean;
}

export interface GuardRailTrailEntry {
  ruleId: GuardRailRuleId | 'default';
  matched: boolean;
  rationale: string;
}

export interface GuardRailDecision {
  ruleId: GuardRailRuleId | 'default';
  /** True when a table rule (not the default) decided the action. */
  forced: boolean;
  action: GuardRailAction;
  rationale: string;
  trail: GuardRailTrailEntry[];
}

// ─── Inducer sizing ───────────────────────────────────────────────────────────

export interface SizingRequirement {
  cfm: number;
  /** At the fan rating temperature; this is what curves are compared against. */
  pressureInWc: number;
  /** Before density correction. */
  pressureAtFlueTempInWc: number;
  excludedConnectorLossInWc: number;
  densityCorrection: number;
}

export type CandidateOutcome = 'accepted' | 'below_domain' | 'above_domain' | 'insufficient_pressure';

export interface CandidateEvaluation {
  seriesId: string;
  modelId: string;
  nominalCapacityCfm: number;
  outcome: CandidateOutcome;
  pressureAtFlowInWc: number | null;
  reason: string;
}

export type InducerOutcome =
  | {
      kind: 'selected';
      seriesId: string;
      modelId: string;
      curve: FanCurve;
      requirement: SizingRequirement;
      pressureAtFlowInWc: number;
      marginInWc: number;
      candidates: CandidateEvaluation[];
    }
  | { kind: 'not_required'; requirement: SizingRequirement; reason: string }
  | { kind: 'no_fit'; requirement: SizingRequirement; error: NoFitError; candidates: CandidateEvaluation[] };

// ─── Controller, supply fan, dampers ──────────────────────────────────────────

export interface ControllerSubsystems {
  poweredInducer: boolean;
  overdraftControl: boolean;
  supplyAir: boolean;
}

export type ApplianceCountBucket = '1' | '2' | '3-4' | '5-6';

export type ControllerOutcome =
  | {
      kind: 'selected';
      baseModel: string;
      suffix: string;
      model: string;
      description: string;
      bucket: ApplianceCountBucket;
      subsystems: ControllerSubsystems;
    }
  | { kind: 'none'; reason: string };

export type SupplyFanOutcome =
  | { kind: 'selected'; modelId: string; curve: FanCurve; requiredCfm: number; capacityCfm: number }
  | { kind: 'not_requested' }
  | { kind: 'no_fit'; requiredCfm: number; error: NoFitError };

export interface BarometricDamper {
  applianceIndex: number;
  diameterIn: number;
}

export interface SelectionResult {
  guardRail: GuardRailDecision;
  inducer: InducerOutcome;
  controller: ControllerOutcome;
  supplyFan: SupplyFanOutcome;
  barometricDampers: BarometricDamper[];
  rationale: string[];
}
