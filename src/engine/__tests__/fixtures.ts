import type { FittingCounts, VentSegment, VentingRequestV1 } from '../schema/VentingInputV1';

export const NO_FITTINGS: FittingCounts = {
  elbow90: 0,
  elbow45: 0,
  elbow30: 0,
  elbow15: 0,
  tee: 0,
  lateralTee: 0,
};

export function segment(overrides: Partial<VentSegment> & Pick<VentSegment, 'diameterIn' | 'ventType'>): VentSegment {
  return {
    lengthFt: 10,
    riseFt: 10,
    fittings: NO_FITTINGS,
    hasTerminationCap: false,
    ...overrides,
  };
}

const preferences = { touchscreen: false, supplyAir: false, overdraftControl: false };

/** 100 MBH Category IV on a 4" UL441 connector, 10 ft long with 15 ft rise, no manifold. */
export const SINGLE_CAT_IV: VentingRequestV1 = {
  appliances: [{ mbh: 100, outletDiameterIn: 4, category: 'IV', fuel: 'natural_gas' }],
  connector: segment({ diameterIn: 4, ventType: 'UL441', lengthFt: 10, riseFt: 15 }),
  ambientTempF: 70,
  barometricPressureInHg: 29.92,
  preferences,
};

/** Three Category I boilers (100 / 200 / 150 MBH) on an 8" manifold with 15 ft rise. */
export const CAT_I_MANIFOLD: VentingRequestV1 = {
  appliances: [
    { mbh: 100, outletDiameterIn: 4, category: 'I', fuel: 'natural_gas' },
    { mbh: 200, outletDiameterIn: 5, category: 'I', fuel: 'natural_gas' },
    { mbh: 150, outletDiameterIn: 5, category: 'I', fuel: 'natural_gas' },
  ],
  connector: segment({ diameterIn: 6, ventType: 'UL441', lengthFt: 5, riseFt: 3, fittings: { ...NO_FITTINGS, elbow90: 1 } }),
  manifold: segment({
    diameterIn: 8,
    ventType: 'UL441',
    lengthFt: 30,
    riseFt: 15,
    fittings: { ...NO_FITTINGS, elbow90: 2, tee: 1 },
    hasTerminationCap: true,
  }),
  ambientTempF: 70,
  barometricPressureInHg: 29.92,
  preferences,
};

/** Same layout with 10 ft rise and the third boiler swapped for a Category II unit. */
export const MIXED_MANIFOLD: VentingRequestV1 = {
  ...CAT_I_MANIFOLD,
  appliances: [
    CAT_I_MANIFOLD.appliances[0],
    CAT_I_MANIFOLD.appliances[1],
    { mbh: 150, outletDiameterIn: 5, category: 'II', fuel: 'natural_gas' },
  ],
  manifold: segment({
    diameterIn: 8,
    ventType: 'UL441',
    lengthFt: 30,
    riseFt: 10,
    fittings: { ...NO_FITTINGS, elbow90: 2, tee: 1 },
    hasTerminationCap: true,
  }),
};

/** Two identical 150 MBH Category IV units with a tall UL1738 manifold. */
export const CAT_IV_TALL: VentingRequestV1 = {
  appliances: [
    { mbh: 150, outletDiameterIn: 3, category: 'IV', fuel: 'natural_gas' },
    { mbh: 150, outletDiameterIn: 3, category: 'IV', fuel: 'natural_gas' },
  ],
  connector: segment({ diameterIn: 4, ventType: 'UL1738', lengthFt: 6, riseFt: 2, fittings: { ...NO_FITTINGS, elbow90: 1 } }),
  manifold: segment({ diameterIn: 6, ventType: 'UL1738', lengthFt: 60, riseFt: 50 }),
  ambientTempF: 70,
  barometricPressureInHg: 29.92,
  preferences,
};

/** Two Category III appliances (120 / 80 MBH) on a UL1738 manifold. */
export const CAT_III_PAIR: VentingRequestV1 = {
  appliances: [
    { mbh: 120, outletDiameterIn: 4, category: 'III', fuel: 'natural_gas' },
    { mbh: 80, outletDiameterIn: 4, category: 'III', fuel: 'natural_gas' },
  ],
  connector: segment({ diameterIn: 4, ventType: 'UL1738', lengthFt: 4, riseFt: 2 }),
  manifold: segment({ diameterIn: 6, ventType: 'UL1738', lengthFt: 20, riseFt: 15 }),
  ambientTempF: 70,
  barometricPressureInHg: 29.92,
  preferences,
};

/** Two Category II units on a short 5" UL1738 run: turndown outlet stays positive (draft starved). */
export const CAT_II_SHORT_RISE: VentingRequestV1 = {
  appliances: [
    { mbh: 300, outletDiameterIn: 5, category: 'II', fuel: 'natural_gas' },
    { mbh: 250, outletDiameterIn: 5, category: 'II', fuel: 'natural_gas' },
  ],
  connector: segment({ diameterIn: 5, ventType: 'UL1738', lengthFt: 4, riseFt: 2 }),
  manifold: segment({ diameterIn: 5, ventType: 'UL1738', lengthFt: 20, riseFt: 2 }),
  ambientTempF: 70,
  barometricPressureInHg: 29.92,
  preferences,
};

/** Six 2000 MBH Category III boilers on a 20" UL1738 manifold, with supply air. */
export const LARGE_CAT_III_PLANT: VentingRequestV1 = {
  appliances: Array.from({ length: 6 }, () => ({
    mbh: 2000,
    outletDiameterIn: 10,
    category: 'III' as const,
    fuel: 'natural_gas' as const,
  })),
  connector: segment({ diameterIn: 10, ventType: 'UL1738', lengthFt: 6, riseFt: 3 }),
  manifold: segment({ diameterIn: 20, ventType: 'UL1738', lengthFt: 40, riseFt: 30 }),
  ambientTempF: 70,
  barometricPressureInHg: 29.92,
  preferences: { ...preferences, supplyAir: true },
};
