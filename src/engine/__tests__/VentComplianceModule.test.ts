import { describe, it, expect } from 'vitest';
import {
  classifyVelocity,
  co2Warnings,
  hasRatingGaps,
  isWithinCategoryRange,
  outletPressureWarnings,
  velocityWarning,
  ventTypeRatingGaps,
  ventTypeWarnings,
} from '../modules/VentComplianceModule';
import { runScenarioEngineV1 } from '../modules/ScenarioEngineModule';
import type { ApplianceSpec } from '../schema/VentingInputV1';
import { CAT_I_MANIFOLD, segment } from './fixtures';

const CAT_IV: ApplianceSpec = { mbh: 100, outletDiameterIn: 4, category: 'IV', fuel: 'natural_gas' };
const OIL_BOILER: ApplianceSpec = { mbh: 300, outletDiameterIn: 6, category: 'BuildingHeating', fuel: 'oil' };

describe('VentComplianceModule: velocity band', () => {
  it('classifies against 300–2000 ft/min, bounds inclusive', () => {
    expect(classifyVelocity(299.9)).toBe('low');
    expect(classifyVelocity(300)).toBe('ok');
    expect(classifyVelocity(2000)).toBe('ok');
    expect(classifyVelocity(2000.1)).toBe('high');
  });

  it('no warning inside the band', () => {
    expect(velocityWarning('ALL', 800)).toBeNull();
  });

  it('low velocity warns about condensate', () => {
    expect(velocityWarning('SINGLE_SMALLEST', 114.8)).toMatchObject({
      id: 'velocity_low',
      severity: 'warn',
      scenario: 'SINGLE_SMALLEST',
      detail: '115 ft/min in SINGLE_SMALLEST is under 300 ft/min. Slow flue gas cools and condensate can pool instead of draining.',
    });
  });

  it('high velocity warns about noise and erosion', () => {
    expect(velocityWarning('ALL', 2400)?.id).toBe('velocity_high');
  });
});

describe('VentComplianceModule: category ranges', () => {
  it('checks outlet pressure inclusively', () => {
    expect(isWithinCategoryRange('I', -0.03)).toBe(true);
    expect(isWithinCategoryRange('I', -0.02)).toBe(false);
    expect(isWithinCategoryRange('III', 0)).toBe(true);
    expect(isWithinCategoryRange('IV', 0.25)).toBe(true);
  });

  it('outlet warnings list every out-of-range appliance in the scenario', () => {
    const { worst } = runScenarioEngineV1(CAT_I_MANIFOLD);
    const warnings = outletPressureWarnings(worst);
    expect(warnings.map(w => w.title)).toEqual([
      'Appliance 1 outlet pressure outside Category I range',
      'Appliance 2 outlet pressure outside Category I range',
      'Appliance 3 outlet pressure outside Category I range',
    ]);
    expect(warnings[1].detail).toBe('-0.007 in. w.c. vs allowed -0.08 to -0.03 in. w.c.');
  });
});

describe('VentComplianceModule: vent type ratings', () => {
  const ul441 = segment({ diameterIn: 4, ventType: 'UL441' });

  it('finds unrated categories and fuels', () => {
    expect(ventTypeRatingGaps(ul441, [CAT_IV, OIL_BOILER])).toEqual({ categories: ['IV', 'BuildingHeating'], fuels: ['oil'] });
    expect(hasRatingGaps(ventTypeRatingGaps(segment({ diameterIn: 6, ventType: 'UL103' }), [OIL_BOILER]))).toBe(false);
  });

  it('one failure per kind of gap', () => {
    const warnings = ventTypeWarnings('connector', ul441, [CAT_IV, OIL_BOILER]);
    expect(warnings.map(w => [w.id, w.severity, w.title])).toEqual([
      ['vent_type_category', 'fail', 'UL441 Type B Gas Vent not rated for Category IV, BuildingHeating'],
      ['vent_type_fuel', 'fail', 'UL441 Type B Gas Vent not rated for No. 2 fuel oil'],
    ]);
    expect(warnings[0].detail).toBe('The connector vent type is listed for Category I only.');
  });

  it('a rated vent raises nothing', () => {
    expect(ventTypeWarnings('manifold', segment({ diameterIn: 6, ventType: 'UL1738' }), [CAT_IV])).toEqual([]);
  });
});

describe('VentComplianceModule: CO₂ readings', () => {
  it('flags a measured reading outside the typical range', () => {
    expect(co2Warnings([CAT_IV, { ...CAT_IV, co2Pct: 6.5 }, { ...OIL_BOILER, co2Pct: 11 }])).toEqual([
      {
        id: 'co2_outside_typical',
        severity: 'info',
        title: 'Appliance 2: CO₂ 6.5% outside typical 8–10.5%',
        detail: 'Flue volume is derived from CO₂; confirm the value with a combustion analyser reading.',
      },
    ]);
  });

  it('does not check category defaults', () => {
    expect(co2Warnings([{ ...CAT_IV, category: 'I' }])).toEqual([]);
  });
});
