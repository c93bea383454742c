import type { CONSTANTS_VERSION, CONTRACT_VERSION, ENGINE_VERSION } from './versions';
import type { ScenarioTag, VelocityBand } from '../engine/schema/VentingInputV1';

// ─── Failure kinds ────────────────────────────────────────────────────────────

export type ValidationErrorCode =
  | 'appliance_count'
  | 'connector_diameter'
  | 'manifold_diameter'
  | 'missing_field'
  | 'out_of_range'
  | 'co2_exceeds_stoichiometric';

/** Request rejected before any calculation ran. */
export interface ValidationError {
  code: ValidationErrorCode;
  /** Dotted path into the request, e.g. "appliances.1.mbh". */
  path: string;
  message: string;
}

export interface NoFitCandidate {
  seriesId: string;
  modelId: string;
  nominalCapacityCfm: number;
  reason: string;
}

/** No catalog model met the requirement. Non-fatal; the calculation still stands. */
export interface NoFitError {
  kind: 'no_fit';
  subject: 'draft_inducer' | 'supply_fan';
  requiredCfm: number;
  requiredPressureInWc?: number;
  seriesConsidered: string[];
  candidates: NoFitCandidate[];
}

export type ComplianceWarningId =
  | 'velocity_low'
  | 'velocity_high'
  | 'vent_type_category'
  | 'vent_type_fuel'
  | 'outlet_pressure_range'
  | 'co2_outside_typical'
  | 'insufficient_natural_draft'
  | 'preferred_series_unavailable';

export interface ComplianceWarning {
  id: ComplianceWarningId;
  severity: 'info' | 'warn' | 'fail';
  title: string;
  detail: string;
  scenario?: ScenarioTag;
  action?: string;
}

// ─── Report record ────────────────────────────────────────────────────────────

export interface VentingMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
  constantsVersion: typeof CONSTANTS_VERSION;
}

export interface ScenarioRowV1 {
  tag: ScenarioTag;
  label: string;
  activeIndices: number[];
  aggregateCfm: number;
  mixedFlueTempF: number;
  velocityFpm: number;
  velocityBand: VelocityBand;
  theoreticalDraftInWc: number;
  pressureLossInWc: number;
  availableDraftInWc: number;
  outletPressureInWc: number;
  isWorstCase: boolean;
}

export interface RecommendationV1 {
  id: string;
  title: string;
  detail: string;
}

export interface PlotPoint {
  flowCfm: number;
  pressureInWc: number;
}

/** Everything an external renderer needs to draw the selected inducer's curve. */
export interface FanCurvePlotV1 {
  modelId: string;
  curve: PlotPoint[];
  /** P = k × Q², passing through the design point. */
  systemCurve: PlotPoint[];
  systemCoefficient: number;
  designPoint: PlotPoint;
  /** Fan curve pressure at the design flow. */
  fanPressureAtDesignInWc: number;
}

export interface VelocityBandV1 {
  velocityFpm: number;
  minFpm: number;
  maxFpm: number;
  band: VelocityBand;
}

/** ALL-scenario common-vent draft scaled for cold and warm weather. */
export interface SeasonalDraftV1 {
  designInWc: number;
  winterInWc: number;
  summerInWc: number;
}

export interface VentingOutputV1 {
  meta: VentingMetaV1;
  status: 'ok' | 'warn' | 'no_fit';
  headline: string;
  worstScenario: ScenarioTag;
  scenarios: ScenarioRowV1[];
  rationale: string[];
  recommendations: RecommendationV1[];
  warnings: ComplianceWarning[];
  noFit: NoFitError[];
  fanCurvePlot: FanCurvePlotV1 | null;
  velocityBand: VelocityBandV1;
  seasonalDraft: SeasonalDraftV1;
}
