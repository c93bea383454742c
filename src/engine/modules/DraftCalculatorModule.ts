import {
  COUNTED_FITTINGS,
  type FittingLossItem,
  type FittingType,
  type PressureLossBreakdown,
  type SegmentAnalysis,
  type SegmentRole,
  type VentSegment,
} from '../schema/VentingInputV1';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from '../utils/ventingConstants';
import { gasDensity, toRankine } from './CombustionModule';

// ── Geometry & velocity ─────────────────────────────────────────────────────

/** Cross-sectional area (ft²) of a round vent: π (D/12)² / 4 */
export function ductAreaFt2(diameterIn: number): number {
  const diameterFt = diameterIn / 12;
  return (Math.PI * diameterFt * diameterFt) / 4;
}

/** Mean gas velocity (ft/min). */
export function velocityFpm(cfm: number, diameterIn: number): number {
  return cfm / ductAreaFt2(diameterIn);
}

/** VP (in. w.c.) = ρ × (V / 1096.2)² */
export function velocityPressure(
  densityLbFt3: number,
  fpm: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): number {
  const ratio = fpm / c.physical.velocityPressureDivisor;
  return densityLbFt3 * ratio * ratio;
}

// ── Stack effect ────────────────────────────────────────────────────────────

/**
 * Theoretical draft (in. w.c.) over `riseFt`:
 *   0.2554 × B × H × (1/T_ambient − 1/T_flue), temperatures in °R.
 * Zero or negative when the flue gas is no warmer than ambient air.
 */
export function theoreticalDraft(
  riseFt: number,
  flueTempF: number,
  ambientTempF: number,
  barometricPressureInHg: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): number {
  return c.physical.draftCoefficient * barometricPressureInHg * riseFt *
    (1 / toRankine(ambientTempF, c) - 1 / toRankine(flueTempF, c));
}

// ── Pressure loss ───────────────────────────────────────────────────────────

/** Fittings a segment carries implicitly because of where it sits in the system. */
export interface ImplicitFittings {
  entrance: boolean;
  exit: boolean;
}

/** Fitting quantities for a segment: counted fittings plus entrance / exit / cap. */
export function fittingQuantities(
  segment: VentSegment,
  implicit: ImplicitFittings,
): Array<[FittingType, number]> {
  const rows: Array<[FittingType, number]> = [
    ['entrance', implicit.entrance ? 1 : 0],
    ['exit', implicit.exit ? 1 : 0],
    ['terminationCap', segment.hasTerminationCap ? 1 : 0],
  ];
  for (const fitting of COUNTED_FITTINGS) {
    rows.push([fitting, segment.fittings[fitting]]);
  }
  return rows.filter(([, quantity]) => quantity > 0);
}

/**
 * Segment loss (in. w.c.) = (f × L / D_in + Σ K × n) × VP.
 * f and every K come from the segment's vent-type table.
 */
export function segmentPressureLoss(
  segment: VentSegment,
  velocityPressureInWc: number,
  implicit: ImplicitFittings,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): PressureLossBreakdown {
  const table = c.ventTypes[segment.ventType];
  const frictionTerm = (table.frictionFactor * segment.lengthFt) / segment.diameterIn;
  const frictionInWc = frictionTerm * velocityPressureInWc;

  const fittings: FittingLossItem[] = fittingQuantities(segment, implicit).map(([fitting, quantity]) => {
    const kEach = table.kFactors[fitting];
    const kTotal = kEach * quantity;
    return { fitting, quantity, kEach, kTotal, lossInWc: kTotal * velocityPressureInWc };
  });

  const sumK = fittings.reduce((sum, f) => sum + f.kTotal, 0);
  const fittingsInWc = sumK * velocityPressureInWc;

  return {
    frictionFactor: table.frictionFactor,
    frictionTerm,
    frictionInWc,
    sumK,
    fittings,
    fittingsInWc,
    totalInWc: frictionInWc + fittingsInWc,
  };
}

// ── Segment analysis ────────────────────────────────────────────────────────

export interface SegmentFlowInput {
  segment: VentSegment;
  role: SegmentRole;
  cfm: number;
  gasTempF: number;
  ambientTempF: number;
  barometricPressureInHg: number;
  implicit: ImplicitFittings;
}

/**
 * Full draft analysis of one vent segment carrying `cfm` at `gasTempF`.
 * Available draft = theoretical draft − total pressure loss.
 */
export function analyzeSegment(
  input: SegmentFlowInput,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): SegmentAnalysis {
  const { segment, role, cfm, gasTempF, ambientTempF, barometricPressureInHg, implicit } = input;

  const areaFt2 = ductAreaFt2(segment.diameterIn);
  const densityLbFt3 = gasDensity(gasTempF, barometricPressureInHg, c);
  const fpm = cfm / areaFt2;
  const vp = velocityPressure(densityLbFt3, fpm, c);
  const theoretical = theoreticalDraft(segment.riseFt, gasTempF, ambientTempF, barometricPressureInHg, c);
  const loss = segmentPressureLoss(segment, vp, implicit, c);

  return {
    role,
    ventType: segment.ventType,
    diameterIn: segment.diameterIn,
    areaFt2,
    cfm,
    gasTempF,
    densityLbFt3,
    velocityFpm: fpm,
    velocityPressureInWc: vp,
    theoreticalDraftInWc: theoretical,
    loss,
    availableDraftInWc: theoretical - loss.totalInWc,
  };
}

// ── Diameter advice ─────────────────────────────────────────────────────────

export interface DiameterOption {
  diameterIn: number;
  velocityFpm: number;
  pressureLossInWc: number;
  availableDraftInWc: number;
  meetsRequirement: boolean;
}

export type DiameterAdvice =
  | { kind: 'fit'; diameterIn: number; analysis: SegmentAnalysis; options: DiameterOption[] }
  | { kind: 'no_fit'; requiredDraftInWc: number; options: DiameterOption[] };

/**
 * Smallest standard diameter (never below `minDiameterIn`) whose available
 * draft reaches `requiredDraftInWc`. Every diameter tried is reported.
 */
export function adviseDiameter(
  input: SegmentFlowInput,
  minDiameterIn: number,
  requiredDraftInWc: number,
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): DiameterAdvice {
  const options: DiameterOption[] = [];
  let chosen: SegmentAnalysis | null = null;

  for (const diameterIn of c.standardDiametersIn.filter(d => d >= minDiameterIn)) {
    const analysis = analyzeSegment({ ...input, segment: { ...input.segment, diameterIn } }, c);
    const meetsRequirement = analysis.availableDraftInWc >= requiredDraftInWc;
    options.push({
      diameterIn,
      velocityFpm: analysis.velocityFpm,
      pressureLossInWc: analysis.loss.totalInWc,
      availableDraftInWc: analysis.availableDraftInWc,
      meetsRequirement,
    });
    if (meetsRequirement && chosen === null) chosen = analysis;
  }

  return chosen
    ? { kind: 'fit', diameterIn: chosen.diameterIn, analysis: chosen, options }
    : { kind: 'no_fit', requiredDraftInWc, options };
}
