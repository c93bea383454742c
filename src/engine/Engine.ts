import type { ValidationError, VentingOutputV1 } from '../contracts/VentingOutputV1';
import type { VentingRequestV1 } from './schema/VentingInputV1';
import { createVentingRequestSchema, validateVentingRequest, VentingRequestSchema } from './schema/VentingRequestSchema';
import { adviseDiameter, type DiameterAdvice } from './modules/DraftCalculatorModule';
import type { FanCurveCatalog, ProductLines } from './modules/FanCurveCatalog';
import { runProductSelectorV1 } from './modules/ProductSelectorModule';
import { runScenarioEngineV1, type ScenarioEngineResult } from './modules/ScenarioEngineModule';
import { buildVentingOutputV1, type VentingEngineCore } from './OutputBuilder';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from './utils/ventingConstants';

export interface VentingEngineOptions {
  constants?: VentingConstants;
  catalog?: FanCurveCatalog;
  productLines?: ProductLines;
}

export interface VentingEngineResult extends VentingEngineCore {
  output: VentingOutputV1;
}

export type VentingEngineResponse =
  | { ok: false; errors: ValidationError[] }
  | ({ ok: true } & VentingEngineResult);

/**
 * Common-vent diameter advice for the worst case, offered only when natural
 * draft falls below the configured minimum.
 */
function adviseCommonVent(
  request: VentingRequestV1,
  calculation: ScenarioEngineResult,
  c: VentingConstants,
): DiameterAdvice | null {
  const { result } = calculation.worst;
  if (result.availableDraftInWc >= c.minAvailableDraftInWc) return null;

  return adviseDiameter(
    {
      segment: request.manifold ?? request.connector,
      role: 'common_vent',
      cfm: result.aggregateCfm,
      gasTempF: result.mixedFlueTempF,
      ambientTempF: request.ambientTempF,
      barometricPressureInHg: request.barometricPressureInHg,
      implicit: { entrance: request.manifold === undefined, exit: true },
    },
    Math.max(...request.appliances.map(a => a.outletDiameterIn)),
    // The worst appliance's connector contribution stays as it is.
    c.minAvailableDraftInWc - (result.availableDraftInWc - result.commonVent.availableDraftInWc),
    c,
  );
}

/** Calculation and selection for a request that has already been validated. */
export function runVentingCalculation(
  request: VentingRequestV1,
  options: VentingEngineOptions = {},
): VentingEngineResult {
  const c = options.constants ?? DEFAULT_VENTING_CONSTANTS;
  const calculation = runScenarioEngineV1(request, c);
  const selector = runProductSelectorV1(request, calculation, {
    catalog: options.catalog,
    productLines: options.productLines,
    constants: c,
  });

  const core: VentingEngineCore = {
    request,
    calculation,
    selection: selector.selection,
    warnings: [...calculation.warnings, ...selector.warnings],
    noFit: selector.noFit,
    diameterAdvice: adviseCommonVent(request, calculation, c),
  };
  return { ...core, output: buildVentingOutputV1(core, c) };
}

/**
 * Engine entry point: one fully formed request in, results or validation
 * errors out. Validation runs before any calculation.
 */
export function runVentingEngine(raw: unknown, options: VentingEngineOptions = {}): VentingEngineResponse {
  const schema = options.constants ? createVentingRequestSchema(options.constants) : VentingRequestSchema;
  const validation = validateVentingRequest(raw, schema);
  if (!validation.ok) return { ok: false, errors: validation.errors };
  return { ok: true, ...runVentingCalculation(validation.request, options) };
}
