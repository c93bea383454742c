import { describe, it, expect } from 'vitest';
import { DEFAULT_FAN_CURVE_CATALOG, DEFAULT_PRODUCT_LINES } from '../modules/FanCurveCatalog';
import {
  computeSizingRequirement,
  orderInducerSeries,
  seriesMatchesFilter,
  sizeInducer,
} from '../modules/InducerSizingModule';
import { runScenarioEngineV1 } from '../modules/ScenarioEngineModule';
import type { SizingRequirement } from '../schema/SelectionV1';
import { CAT_IV_TALL, MIXED_MANIFOLD } from './fixtures';

function requirement(cfm: number, pressureInWc: number): SizingRequirement {
  return { cfm, pressureInWc, pressureAtFlueTempInWc: pressureInWc, excludedConnectorLossInWc: 0, densityCorrection: 1 };
}

function seriesById(id: string) {
  const series = DEFAULT_PRODUCT_LINES.inducerSeries.find(s => s.id === id);
  if (!series) throw new Error(`missing series ${id}`);
  return series;
}

describe('InducerSizingModule: computeSizingRequirement', () => {
  it('corrects the shortfall to the 70 °F rating density', () => {
    const { worst } = runScenarioEngineV1(MIXED_MANIFOLD);
    const req = computeSizingRequirement(worst, false);
    expect(req.cfm).toBeCloseTo(167.235234, 5);
    expect(req.pressureAtFlueTempInWc).toBeCloseTo(0.00894577, 7);
    expect(req.densityCorrection).toBeCloseTo(1.45280545, 7);
    expect(req.pressureInWc).toBeCloseTo(0.01299646, 7);
    expect(req.excludedConnectorLossInWc).toBe(0);
  });

  it('excluding connector loss adds it back to available draft', () => {
    const { worst } = runScenarioEngineV1(CAT_IV_TALL);
    const req = computeSizingRequirement(worst, true);
    expect(req.excludedConnectorLossInWc).toBeCloseTo(0.01528008, 7);
    expect(req.pressureAtFlueTempInWc).toBe(0);
    expect(req.pressureInWc).toBe(0);
  });
});

describe('InducerSizingModule: series order', () => {
  it('filters by capability', () => {
    expect(seriesMatchesFilter(seriesById('TM'), 'variable_speed')).toBe(false);
    expect(seriesMatchesFilter(seriesById('CR'), 'condensing_rated')).toBe(true);
    expect(orderInducerSeries(DEFAULT_PRODUCT_LINES, 'condensing_rated').series.map(s => s.id)).toEqual(['CR']);
    expect(orderInducerSeries(DEFAULT_PRODUCT_LINES, 'variable_speed').series.map(s => s.id)).toEqual(['IL', 'RA', 'CR']);
  });

  it('moves an eligible preferred series to the front', () => {
    const { series, preferred } = orderInducerSeries(DEFAULT_PRODUCT_LINES, 'any', 'TM');
    expect(preferred).toBe('applied');
    expect(series.map(s => s.id)).toEqual(['TM', 'IL', 'RA', 'CR']);
  });

  it('reports a preferred series the guard rail excludes', () => {
    const { series, preferred } = orderInducerSeries(DEFAULT_PRODUCT_LINES, 'variable_speed', 'TM');
    expect(preferred).toBe('excluded_by_guard_rail');
    expect(series.map(s => s.id)).toEqual(['IL', 'RA', 'CR']);
  });

  it('reports an unknown preferred series', () => {
    expect(orderInducerSeries(DEFAULT_PRODUCT_LINES, 'any', 'XX').preferred).toBe('unknown');
    expect(orderInducerSeries(DEFAULT_PRODUCT_LINES, 'any').preferred).toBe('none');
  });
});

describe('InducerSizingModule: sizeInducer', () => {
  it('selects the smallest condensing-rated model covering the flow', () => {
    const outcome = sizeInducer(requirement(30.906526544308402, 0), [seriesById('CR')], DEFAULT_FAN_CURVE_CATALOG);
    expect(outcome.kind).toBe('selected');
    if (outcome.kind !== 'selected') return;
    expect(outcome.modelId).toBe('CR-005');
    expect(outcome.pressureAtFlowInWc).toBeCloseTo(0.69546737, 7);
    expect(outcome.marginInWc).toBeCloseTo(0.69546737, 7);
    expect(outcome.candidates).toHaveLength(1);
  });

  it('skips models whose sampled range excludes the flow', () => {
    const outcome = sizeInducer(requirement(167.2352343944753, 0.013), [seriesById('IL')], DEFAULT_FAN_CURVE_CATALOG);
    expect(outcome.kind).toBe('selected');
    if (outcome.kind !== 'selected') return;
    expect(outcome.modelId).toBe('IL-015');
    expect(outcome.pressureAtFlowInWc).toBeCloseTo(0.82286787, 7);
    expect(outcome.candidates.map(c => [c.modelId, c.outcome])).toEqual([
      ['IL-004', 'above_domain'],
      ['IL-010', 'above_domain'],
      ['IL-015', 'accepted'],
    ]);
    expect(outcome.candidates[0].reason).toBe('167.2 cfm outside sampled range 10–70 cfm');
  });

  it('returns a no-fit listing every candidate when nothing qualifies', () => {
    const outcome = sizeInducer(requirement(30.906526544308402, 2), [seriesById('CR')], DEFAULT_FAN_CURVE_CATALOG);
    expect(outcome.kind).toBe('no_fit');
    if (outcome.kind !== 'no_fit') return;
    expect(outcome.candidates.map(c => c.outcome)).toEqual([
      'insufficient_pressure',
      'insufficient_pressure',
      'below_domain',
      'below_domain',
      'below_domain',
    ]);
    expect(outcome.error).toMatchObject({
      kind: 'no_fit',
      subject: 'draft_inducer',
      requiredPressureInWc: 2,
      seriesConsidered: ['CR'],
    });
    expect(outcome.error.candidates.map(c => c.reason)).toEqual([
      '0.695 in. w.c. at 30.9 cfm is below 2.000 required',
      '0.973 in. w.c. at 30.9 cfm is below 2.000 required',
      '30.9 cfm outside sampled range 40–400 cfm',
      '30.9 cfm outside sampled range 80–800 cfm',
      '30.9 cfm outside sampled range 160–1600 cfm',
    ]);
  });

  it('never accepts a model outside its sampled range', () => {
    const outcome = sizeInducer(requirement(5, 0), DEFAULT_PRODUCT_LINES.inducerSeries, DEFAULT_FAN_CURVE_CATALOG);
    expect(outcome.kind).toBe('no_fit');
    if (outcome.kind !== 'no_fit') return;
    expect(outcome.candidates.every(c => c.outcome === 'below_domain')).toBe(true);
    expect(outcome.candidates).toHaveLength(23);
  });
});
