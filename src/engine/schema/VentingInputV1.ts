export const APPLIANCE_CATEGORIES = ['I', 'II', 'III', 'IV', 'BuildingHeating'] as const;
export type ApplianceCategory = typeof APPLIANCE_CATEGORIES[number];

export const FUEL_TYPES = ['natural_gas', 'propane', 'oil'] as const;
export type FuelType = typeof FUEL_TYPES[number];

export const VENT_TYPES = ['UL441', 'UL103', 'UL1738'] as const;
export type VentType = typeof VENT_TYPES[number];

/** Fittings the installer counts on a segment. */
export const COUNTED_FITTINGS = ['elbow90', 'elbow45', 'elbow30', 'elbow15', 'tee', 'lateralTee'] as const;
export type CountedFitting = typeof COUNTED_FITTINGS[number];

/** Every K-factor a vent-type table must define (counted fittings plus the implicit ones). */
export const FITTING_TYPES = ['entrance', 'exit', 'terminationCap', ...COUNTED_FITTINGS] as const;
export type FittingType = typeof FITTING_TYPES[number];

export const SCENARIO_TAGS = ['ALL', 'ALL_MINUS_LARGEST', 'SINGLE_LARGEST', 'SINGLE_SMALLEST'] as const;
export type ScenarioTag = typeof SCENARIO_TAGS[number];

export type FittingCounts = Record<CountedFitting, number>;

export interface ApplianceSpec {
  label?: string;
  mbh: number;              // heat input, thousand BTU/h
  outletDiameterIn: number;
  category: ApplianceCategory;
  fuel: FuelType;
  co2Pct?: number;          // overrides the category default
  flueTempF?: number;       // overrides the category default
}

export interface VentSegment {
  diameterIn: number;
  lengthFt: number;
  riseFt: number;
  ventType: VentType;
  fittings: FittingCounts;
  hasTerminationCap: boolean;
}

export interface VentingPreferences {
  touchscreen: boolean;
  supplyAir: boolean;
  overdraftControl: boolean;
  /** Try this inducer series before the standard priority order. */
  inducerSeries?: string;
}

/** One fully formed calculation request. Barometric pressure arrives pre-resolved. */
export interface VentingRequestV1 {
  appliances: ApplianceSpec[];
  connector: VentSegment;
  manifold?: VentSegment;
  ambientTempF: number;
  barometricPressureInHg: number;
  preferences: VentingPreferences;
}

// ─── Combustion ───────────────────────────────────────────────────────────────

export interface CombustionResult {
  massFactor: number;       // lb of products per 1000 BTU
  massFlowLbHr: number;
  massFlowLbMin: number;
  densityLbFt3: number;     // at flue temperature
  cfm: number;
  excessAirPct: number;
}

export interface MixedFlowResult {
  totalCfm: number;
  totalMassFlowLbMin: number;
  mixedTempF: number;
}

// ─── Segment analysis ─────────────────────────────────────────────────────────

export interface FittingLossItem {
  fitting: FittingType;
  quantity: number;
  kEach: number;
  kTotal: number;
  lossInWc: number;
}

export interface PressureLossBreakdown {
  frictionFactor: number;
  frictionTerm: number;     // f × L / D
  frictionInWc: number;
  sumK: number;
  fittings: FittingLossItem[];
  fittingsInWc: number;
  totalInWc: number;
}

export type SegmentRole = 'connector' | 'common_vent';

export interface SegmentAnalysis {
  role: SegmentRole;
  ventType: VentType;
  diameterIn: number;
  areaFt2: number;
  cfm: number;
  gasTempF: number;
  densityLbFt3: number;
  velocityFpm: number;
  velocityPressureInWc: number;
  theoreticalDraftInWc: number;
  loss: PressureLossBreakdown;
  availableDraftInWc: number;
}

// ─── Scenario results ─────────────────────────────────────────────────────────

export interface OperatingScenario {
  tag: ScenarioTag;
  activeIndices: number[];
}

export interface ApplianceFlowResult {
  index: number;
  category: ApplianceCategory;
  mbh: number;
  co2Pct: number;
  flueTempF: number;
  combustion: CombustionResult;
  connector: SegmentAnalysis | null;
  /** Connector + common vent available draft along this appliance's path. */
  pathAvailableDraftInWc: number;
  /** −pathAvailableDraft; negative means below atmospheric. */
  outletPressureInWc: number;
  withinCategoryLimits: boolean;
}

export type VelocityBand = 'low' | 'ok' | 'high';

export interface ComplianceFlags {
  velocityBand: VelocityBand;
  ventTypeRated: boolean;
  outletPressureWithinLimits: boolean;
}

export interface CalculationResult {
  appliances: ApplianceFlowResult[];
  aggregateCfm: number;
  totalMassFlowLbMin: number;
  mixedFlueTempF: number;
  commonVent: SegmentAnalysis;
  velocityFpm: number;
  /** Index of the appliance whose path has the least available draft. */
  worstApplianceIndex: number;
  theoreticalDraftInWc: number;
  pressureLoss: {
    connectorInWc: number;
    commonVentInWc: number;
    totalInWc: number;
  };
  availableDraftInWc: number;
  outletPressureInWc: number;
  compliance: ComplianceFlags;
}

export interface ScenarioOutcome {
  scenario: OperatingScenario;
  result: CalculationResult;
}
