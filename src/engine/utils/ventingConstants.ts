/**
 * Formula constants, category defaults and vent-type tables.
 *
 * Data source: src/data/venting-constants.json. The combustion and stack-effect
 * constants come from the ASHRAE chimney design equations; edit the JSON to
 * update them rather than touching the calculators.
 */

import { z } from 'zod';
import constantsData from '../../data/venting-constants.json';
import {
  APPLIANCE_CATEGORIES,
  FUEL_TYPES,
  VENT_TYPES,
  type ApplianceCategory,
  type FittingType,
  type FuelType,
  type VentType,
} from '../schema/VentingInputV1';
import { deepFreeze } from './deepFreeze';

const positive = z.number().positive();

const FuelConstantsSchema = z.object({
  label: z.string(),
  scale: positive,
  base: z.number().nonnegative(),
  co2Coefficient: positive,
  stoichiometricCo2Pct: positive,
  typicalCo2RangePct: z.tuple([positive, positive]),
});

const CategoryConstantsSchema = z.object({
  label: z.string(),
  co2Pct: positive,
  flueTempF: z.number(),
  ventPressure: z.enum(['negative', 'positive']),
  condensing: z.boolean(),
  outletPressureRangeInWc: z.tuple([z.number(), z.number()]),
});

const KFactorTableSchema = z.object({
  entrance: z.number().nonnegative(),
  exit: z.number().nonnegative(),
  terminationCap: z.number().nonnegative(),
  elbow15: z.number().nonnegative(),
  elbow30: z.number().nonnegative(),
  elbow45: z.number().nonnegative(),
  elbow90: z.number().nonnegative(),
  tee: z.number().nonnegative(),
  lateralTee: z.number().nonnegative(),
});

const VentTypeConstantsSchema = z.object({
  label: z.string(),
  frictionFactor: z.number().nonnegative(),
  kFactors: KFactorTableSchema,
  ratedCategories: z.array(z.enum(APPLIANCE_CATEGORIES)),
  ratedFuels: z.array(z.enum(FUEL_TYPES)),
});

export const VentingConstantsSchema = z.object({
  physical: z.object({
    rankineOffset: positive,
    gasConstantAir: positive,
    standardAtmospherePsf: positive,
    standardBarometricInHg: positive,
    draftCoefficient: positive,
    velocityPressureDivisor: positive,
    fanRatingTempF: z.number(),
  }),
  fuels: z.object({
    natural_gas: FuelConstantsSchema,
    propane: FuelConstantsSchema,
    oil: FuelConstantsSchema,
  }),
  categories: z.object({
    I: CategoryConstantsSchema,
    II: CategoryConstantsSchema,
    III: CategoryConstantsSchema,
    IV: CategoryConstantsSchema,
    BuildingHeating: CategoryConstantsSchema,
  }),
  ventTypes: z.object({
    UL441: VentTypeConstantsSchema,
    UL103: VentTypeConstantsSchema,
    UL1738: VentTypeConstantsSchema,
  }),
  velocityBandFpm: z.object({ min: z.number().nonnegative(), max: positive }),
  guardRails: z.object({ categoryIvPressureThresholdInWc: z.number().nonnegative() }),
  recommendations: z.object({
    excessiveDraftInWc: positive,
    maxInducerDeficitInWc: positive,
  }),
  seasonalDraftFactors: z.object({ winter: positive, summer: positive }),
  standardDiametersIn: z.array(positive).min(1),
  minAvailableDraftInWc: z.number(),
});

export type VentingConstants = z.infer<typeof VentingConstantsSchema>;
export type FuelConstants = z.infer<typeof FuelConstantsSchema>;
export type CategoryConstants = z.infer<typeof CategoryConstantsSchema>;
export type VentTypeConstants = z.infer<typeof VentTypeConstantsSchema>;
export type KFactorTable = Record<FittingType, number>;

/** Per-section overrides; each section is shallow-merged over the file defaults. */
export interface VentingConstantsOverrides {
  physical?: Partial<VentingConstants['physical']>;
  fuels?: Partial<Record<FuelType, Partial<FuelConstants>>>;
  categories?: Partial<Record<ApplianceCategory, Partial<CategoryConstants>>>;
  ventTypes?: Partial<Record<VentType, Partial<VentTypeConstants>>>;
  velocityBandFpm?: Partial<VentingConstants['velocityBandFpm']>;
  guardRails?: Partial<VentingConstants['guardRails']>;
  recommendations?: Partial<VentingConstants['recommendations']>;
  seasonalDraftFactors?: Partial<VentingConstants['seasonalDraftFactors']>;
  standardDiametersIn?: number[];
  minAvailableDraftInWc?: number;
}

/**
 * Parse and check a constants document. Throws with every problem listed.
 * The result is frozen: calculations share it and never write to it.
 */
export function parseVentingConstants(raw: unknown): VentingConstants {
  const parsed = VentingConstantsSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Invalid venting constants:\n  ${problems.join('\n  ')}`);
  }
  for (const category of APPLIANCE_CATEGORIES) {
    const [min, max] = parsed.data.categories[category].outletPressureRangeInWc;
    if (min > max) {
      throw new Error(`Invalid venting constants: categories.${category}.outletPressureRangeInWc is inverted (${min} > ${max}).`);
    }
  }
  return deepFreeze(parsed.data);
}

/** File defaults, parsed once at module load and shared read-only. */
export const DEFAULT_VENTING_CONSTANTS: VentingConstants = parseVentingConstants(constantsData);

function mergeRecord<K extends string, V extends object>(
  base: Record<K, V>,
  keys: readonly K[],
  overrides: Partial<Record<K, Partial<V>>> | undefined,
): Record<K, V> {
  if (!overrides) return base;
  const merged = { ...base };
  for (const key of keys) {
    const patch = overrides[key];
    if (patch) merged[key] = { ...base[key], ...patch };
  }
  return merged;
}

/**
 * Resolve the constants used by a calculation. Overrides are re-validated so a
 * bad patch fails the same way a bad file does.
 */
export function resolveVentingConstants(
  overrides?: VentingConstantsOverrides,
  base: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): VentingConstants {
  if (!overrides) return base;
  return parseVentingConstants({
    physical: { ...base.physical, ...overrides.physical },
    fuels: mergeRecord(base.fuels, FUEL_TYPES, overrides.fuels),
    categories: mergeRecord(base.categories, APPLIANCE_CATEGORIES, overrides.categories),
    ventTypes: mergeRecord(base.ventTypes, VENT_TYPES, overrides.ventTypes),
    velocityBandFpm: { ...base.velocityBandFpm, ...overrides.velocityBandFpm },
    guardRails: { ...base.guardRails, ...overrides.guardRails },
    recommendations: { ...base.recommendations, ...overrides.recommendations },
    seasonalDraftFactors: { ...base.seasonalDraftFactors, ...overrides.seasonalDraftFactors },
    standardDiametersIn: overrides.standardDiametersIn ?? base.standardDiametersIn,
    minAvailableDraftInWc: overrides.minAvailableDraftInWc ?? base.minAvailableDraftInWc,
  });
}
