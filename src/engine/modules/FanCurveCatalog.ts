/**
 * FanCurveCatalog
 *
 * Read-only lookup from a hardware model id to its sampled performance curve,
 * plus the product-line metadata (series priority and capability flags) the
 * selector iterates over.
 *
 * Data sources: src/data/fan-curves.json (model id → [[flowCfm, pressureInWc], …])
 * and src/data/product-lines.json. Both are validated once at module load; a
 * malformed file throws with every problem listed.
 */

import { z } from 'zod';
import fanCurveData from '../../data/fan-curves.json';
import productLineData from '../../data/product-lines.json';
import { curveDomain, type CurveDomain, type CurveSample } from '../utils/curveInterpolation';
import { deepFreeze } from '../utils/deepFreeze';

export interface FanCurve {
  modelId: string;
  samples: readonly CurveSample[];
  domain: CurveDomain;
}

export type FanCurveCatalog = ReadonlyMap<string, FanCurve>;

export interface InducerSeries {
  id: string;
  label: string;
  /** Lower runs first; the most compact series has priority 1. */
  priority: number;
  variableSpeed: boolean;
  condensingRated: boolean;
  models: readonly string[];
}

export interface ProductLines {
  /** Sorted by ascending priority. */
  inducerSeries: readonly InducerSeries[];
  supplyFans: {
    id: string;
    label: string;
    models: readonly string[];
  };
}

const FanCurveFileSchema = z.record(
  z.string().min(1),
  z.array(z.tuple([z.number().nonnegative(), z.number()])),
);

const ProductLinesFileSchema = z.object({
  inducerSeries: z.array(z.object({
    id: z.string().min(1),
    label: z.string(),
    priority: z.number().int(),
    variableSpeed: z.boolean(),
    condensingRated: z.boolean(),
    models: z.array(z.string()).min(1),
  })).min(1),
  supplyFans: z.object({
    id: z.string().min(1),
    label: z.string(),
    models: z.array(z.string()),
  }),
});

function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/**
 * Build a catalog from the abstract source shape. Every curve needs at least
 * two samples with strictly increasing flow. Curves are frozen once built.
 */
export function createFanCurveCatalog(raw: unknown): FanCurveCatalog {
  const parsed = FanCurveFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid fan curve catalog:\n  ${formatIssues(parsed.error.issues).join('\n  ')}`);
  }

  const problems: string[] = [];
  const catalog = new Map<string, FanCurve>();
  for (const [modelId, points] of Object.entries(parsed.data)) {
    if (points.length < 2) {
      problems.push(`${modelId}: needs at least 2 samples, got ${points.length}`);
      continue;
    }
    const samples = points.map(([flowCfm, pressureInWc]) => ({ flowCfm, pressureInWc }));
    const badIndex = samples.findIndex((s, i) => i > 0 && s.flowCfm <= samples[i - 1].flowCfm);
    if (badIndex !== -1) {
      problems.push(`${modelId}: flow must strictly increase (sample ${badIndex} is ${samples[badIndex].flowCfm} cfm)`);
      continue;
    }
    catalog.set(modelId, deepFreeze({ modelId, samples, domain: curveDomain(samples) }));
  }

  if (problems.length > 0) {
    throw new Error(`Invalid fan curve catalog:\n  ${problems.join('\n  ')}`);
  }
  return catalog;
}

/** Product lines checked against a catalog: every referenced model must have a curve. */
export function createProductLines(raw: unknown, catalog: FanCurveCatalog): ProductLines {
  const parsed = ProductLinesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid product lines:\n  ${formatIssues(parsed.error.issues).join('\n  ')}`);
  }

  const { inducerSeries, supplyFans } = parsed.data;
  const missing = [...inducerSeries.flatMap(s => s.models), ...supplyFans.models]
    .filter(id => !catalog.has(id));
  const seriesIds = inducerSeries.map(s => s.id);
  const duplicated = seriesIds.filter((id, i) => seriesIds.indexOf(id) !== i);

  const problems = [
    ...missing.map(id => `model ${id} has no fan curve`),
    ...duplicated.map(id => `series ${id} is declared more than once`),
  ];
  if (problems.length > 0) {
    throw new Error(`Invalid product lines:\n  ${problems.join('\n  ')}`);
  }

  return deepFreeze({
    inducerSeries: [...inducerSeries].sort((a, b) => a.priority - b.priority || a.id.localeCompare(b.id)),
    supplyFans,
  });
}

/** Nominal capacity = maximum sampled flow. */
export function nominalCapacityCfm(curve: FanCurve): number {
  return curve.domain.maxFlowCfm;
}

/**
 * Curves for `modelIds`, ascending by nominal capacity (ties by id).
 * Ids without a curve are skipped.
 */
export function curvesByCapacity(catalog: FanCurveCatalog, modelIds: readonly string[]): FanCurve[] {
  return modelIds
    .flatMap(id => {
      const curve = catalog.get(id);
      return curve ? [curve] : [];
    })
    .sort((a, b) => nominalCapacityCfm(a) - nominalCapacityCfm(b) || a.modelId.localeCompare(b.modelId));
}

export const DEFAULT_FAN_CURVE_CATALOG: FanCurveCatalog = createFanCurveCatalog(fanCurveData);
export const DEFAULT_PRODUCT_LINES: ProductLines = createProductLines(productLineData, DEFAULT_FAN_CURVE_CATALOG);
