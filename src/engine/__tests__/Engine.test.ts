import { describe, it, expect } from 'vitest';
import { runVentingCalculation, runVentingEngine } from '../Engine';
import { buildFanCurvePlot } from '../OutputBuilder';
import { createProductLines, DEFAULT_FAN_CURVE_CATALOG } from '../modules/FanCurveCatalog';
import { resolveVentingConstants } from '../utils/ventingConstants';
import { CAT_I_MANIFOLD, CAT_III_PAIR, CAT_IV_TALL, MIXED_MANIFOLD, SINGLE_CAT_IV } from './fixtures';

describe('Engine: single Category IV appliance', () => {
  const result = runVentingCalculation(SINGLE_CAT_IV);
  const { output } = result;

  it('stamps the contract versions', () => {
    expect(output.meta).toEqual({ engineVersion: '1.0.0', contractVersion: 'venting-v1', constantsVersion: '2024.1' });
  });

  it('reports every scenario with the worst case marked', () => {
    expect(output.scenarios.map(s => s.tag)).toEqual(['ALL', 'SINGLE_LARGEST', 'SINGLE_SMALLEST']);
    expect(output.scenarios.map(s => s.isWorstCase)).toEqual([true, false, false]);
    expect(output.worstScenario).toBe('ALL');
    expect(output.scenarios[0].availableDraftInWc).toBeCloseTo(0.0462956, 6);
    expect(output.scenarios[0].pressureLossInWc).toBeCloseTo(0.01408952, 7);
  });

  it('selects the smallest condensing-rated inducer', () => {
    expect(output.headline).toBe('All appliances firing: 0.046 in. w.c. available draft; draft inducer CR-005.');
    expect(output.recommendations.map(r => r.id)).toEqual(['draft_inducer', 'controller']);
    expect(output.recommendations[0]).toEqual({
      id: 'draft_inducer',
      title: 'Draft inducer CR-005',
      detail: 'Delivers 0.695 in. w.c. at 30.9 cfm against 0.000 required.',
    });
  });

  it('warns that UL441 is not rated for Category IV', () => {
    expect(output.warnings.map(w => w.id)).toEqual(['vent_type_category']);
    expect(output.status).toBe('warn');
    expect(output.noFit).toEqual([]);
    expect(result.diameterAdvice).toBeNull();
  });

  it('carries the fan curve plot and velocity band', () => {
    const plot = output.fanCurvePlot;
    expect(plot).not.toBeNull();
    if (!plot) return;
    expect(plot.modelId).toBe('CR-005');
    expect(plot.curve).toHaveLength(4);
    expect(plot.systemCurve).toHaveLength(13);
    expect(plot.systemCurve[12].flowCfm).toBe(100);
    expect(plot.systemCoefficient).toBe(0);
    expect(plot.designPoint.flowCfm).toBeCloseTo(30.906527, 5);
    expect(plot.fanPressureAtDesignInWc).toBeCloseTo(0.69546737, 7);
    expect(output.velocityBand).toMatchObject({ minFpm: 300, maxFpm: 2000, band: 'ok' });
    expect(output.velocityBand.velocityFpm).toBeCloseTo(354.1627, 3);
  });

  it('scales the design draft for winter and summer', () => {
    const { designInWc, winterInWc, summerInWc } = output.seasonalDraft;
    expect(designInWc).toBeCloseTo(0.0462956, 6);
    expect(winterInWc).toBeCloseTo(0.0648138, 6);
    expect(summerInWc).toBeCloseTo(0.0277774, 6);
  });
});

describe('Engine: multi-appliance systems', () => {
  it('Category I manifold: dampers, natural draft and diameter advice', () => {
    const { output, diameterAdvice } = runVentingCalculation(CAT_I_MANIFOLD);
    expect(output.headline).toBe('All appliances firing: 0.007 in. w.c. available draft; natural draft.');
    expect(output.status).toBe('warn');
    expect(output.fanCurvePlot).toBeNull();
    expect(diameterAdvice?.kind).toBe('fit');
    expect(output.recommendations).toEqual([
      {
        id: 'barometric_dampers',
        title: '3 barometric dampers',
        detail: 'Appliance 1: 4" damper; Appliance 2: 5" damper; Appliance 3: 5" damper',
      },
      {
        id: 'vent_diameter',
        title: 'Common vent 10" diameter',
        detail: 'Smallest standard diameter reaching 0.02 in. w.c. natural draft (common vent 0.044 in. w.c. in the worst case).',
      },
    ]);
  });

  it('mixed categories: forced inducer with a system curve through the design point', () => {
    const { output, selection } = runVentingCalculation(MIXED_MANIFOLD);
    expect(selection.guardRail.ruleId).toBe('mixed-categories');
    const plot = output.fanCurvePlot;
    if (!plot) throw new Error('expected a fan curve plot');
    expect(plot.modelId).toBe('IL-015');
    expect(plot.designPoint.pressureInWc).toBeCloseTo(0.01299646, 7);
    const atDesign = plot.systemCoefficient * plot.designPoint.flowCfm ** 2;
    expect(atDesign).toBeCloseTo(plot.designPoint.pressureInWc, 12);
    expect(plot.systemCurve[0]).toEqual({ flowCfm: 0, pressureInWc: 0 });
  });

  it('tall Category IV: connector loss excluded and overdraft flagged', () => {
    const { output, selection } = runVentingCalculation(CAT_IV_TALL);
    expect(selection.guardRail.ruleId).toBe('category-iv-positive-pressure');
    expect(selection.inducer.kind === 'selected' ? selection.inducer.modelId : null).toBe('IL-010');
    expect(selection.controller).toMatchObject({ kind: 'selected', model: 'DC150-V' });
    expect(output.recommendations.find(r => r.id === 'overdraft_control')?.detail).toBe(
      'Available draft reaches 0.185 in. w.c.; a draft regulator keeps appliances inside their limits.',
    );
  });

  it('Category III turndown: variable-speed inducer with overdraft control', () => {
    const { output, selection } = runVentingCalculation(CAT_III_PAIR);
    expect(selection.guardRail.ruleId).toBe('turndown-overdraft');
    expect(selection.inducer.kind === 'selected' ? selection.inducer.modelId : null).toBe('IL-004');
    expect(selection.controller).toMatchObject({ kind: 'selected', model: 'DC150-OV' });
    expect(output.recommendations.map(r => r.id)).toEqual(['draft_inducer', 'controller']);
    expect(output.warnings.filter(w => w.id === 'outlet_pressure_range')).toHaveLength(2);
  });

  it('a catalog with nothing large enough yields no_fit status', () => {
    const productLines = createProductLines(
      {
        inducerSeries: [{ id: 'XS', label: 'Extra small', priority: 1, variableSpeed: true, condensingRated: true, models: ['IL-004'] }],
        supplyFans: { id: 'SA', label: 'Supply air', models: ['SA-150'] },
      },
      DEFAULT_FAN_CURVE_CATALOG,
    );
    const { output } = runVentingCalculation(MIXED_MANIFOLD, { productLines });
    expect(output.status).toBe('no_fit');
    expect(output.headline).toBe('All appliances firing: -0.009 in. w.c. available draft; no catalog inducer fits.');
    expect(output.fanCurvePlot).toBeNull();
    expect(buildFanCurvePlot(runVentingCalculation(MIXED_MANIFOLD, { productLines }).selection)).toBeNull();
  });
});

describe('Engine: runVentingEngine', () => {
  it('validates before calculating', () => {
    const response = runVentingEngine({});
    expect(response.ok).toBe(false);
    if (response.ok) return;
    expect(response.errors.map(e => [e.code, e.path])).toEqual([
      ['missing_field', 'appliances'],
      ['missing_field', 'connector'],
      ['missing_field', 'ambientTempF'],
      ['missing_field', 'barometricPressureInHg'],
    ]);
  });

  it('runs a valid request end to end', () => {
    const response = runVentingEngine({
      appliances: [{ mbh: 100, outletDiameterIn: 4, category: 'IV', fuel: 'natural_gas' }],
      connector: { diameterIn: 4, lengthFt: 10, riseFt: 15, ventType: 'UL441' },
      ambientTempF: 70,
      barometricPressureInHg: 29.92,
    });
    expect(response.ok).toBe(true);
    if (!response.ok) return;
    expect(response.request).toEqual(SINGLE_CAT_IV);
    expect(response.output).toEqual(runVentingCalculation(SINGLE_CAT_IV).output);
  });

  it('seasonal factors come from the constants', () => {
    const constants = resolveVentingConstants({ seasonalDraftFactors: { winter: 2 } });
    const { output } = runVentingCalculation(CAT_I_MANIFOLD, { constants });
    expect(output.seasonalDraft.winterInWc).toBeCloseTo(output.seasonalDraft.designInWc * 2, 12);
    expect(output.seasonalDraft.summerInWc).toBeCloseTo(output.seasonalDraft.designInWc * 0.6, 12);
  });

  it('is deterministic', () => {
    expect(runVentingCalculation(MIXED_MANIFOLD)).toEqual(runVentingCalculation(MIXED_MANIFOLD));
  });

  it('applies constant overrides to both validation and calculation', () => {
    const constants = resolveVentingConstants({ minAvailableDraftInWc: 0.05 });
    const response = runVentingEngine(SINGLE_CAT_IV, { constants });
    if (!response.ok) throw new Error('expected a valid request');
    expect(response.diameterAdvice?.kind === 'fit' ? response.diameterAdvice.diameterIn : null).toBe(5);
    expect(response.output.recommendations.at(-1)).toEqual({
      id: 'vent_diameter',
      title: 'Common vent 5" diameter',
      detail: 'Smallest standard diameter reaching 0.05 in. w.c. natural draft (common vent 0.055 in. w.c. in the worst case).',
    });
  });
});
