import { z } from 'zod';
import type { ValidationError, ValidationErrorCode } from '../../contracts/VentingOutputV1';
import {
  APPLIANCE_CATEGORIES,
  FUEL_TYPES,
  VENT_TYPES,
  type VentingRequestV1,
} from './VentingInputV1';
import { resolveFlueConditions } from '../modules/CombustionModule';
import { DEFAULT_VENTING_CONSTANTS, type VentingConstants } from '../utils/ventingConstants';

export const MIN_APPLIANCES = 1;
export const MAX_APPLIANCES = 6;

const fittingCount = z.number().int().nonnegative().default(0);

const FittingsSchema = z.object({
  elbow90: fittingCount,
  elbow45: fittingCount,
  elbow30: fittingCount,
  elbow15: fittingCount,
  tee: fittingCount,
  lateralTee: fittingCount,
}).default({});

const VentSegmentSchema = z.object({
  diameterIn: z.number().positive().max(48),
  lengthFt: z.number().nonnegative().max(500),
  riseFt: z.number().nonnegative().max(500),
  ventType: z.enum(VENT_TYPES),
  fittings: FittingsSchema,
  hasTerminationCap: z.boolean().default(false),
});

const ApplianceSpecSchema = z.object({
  label: z.string().optional(),
  mbh: z.number().positive().max(20_000),
  outletDiameterIn: z.number().positive().max(36),
  category: z.enum(APPLIANCE_CATEGORIES),
  fuel: z.enum(FUEL_TYPES),
  co2Pct: z.number().positive().max(20).optional(),
  flueTempF: z.number().min(32).max(1400).optional(),
});

const PreferencesSchema = z.object({
  touchscreen: z.boolean().default(false),
  supplyAir: z.boolean().default(false),
  overdraftControl: z.boolean().default(false),
  inducerSeries: z.string().min(1).optional(),
}).default({});

function customIssue(ctx: z.RefinementCtx, code: ValidationErrorCode, path: (string | number)[], message: string): void {
  ctx.addIssue({ code: z.ZodIssueCode.custom, path, message, params: { code } });
}

/**
 * Request schema with the cross-field checks that need the constants table:
 * segment diameters against outlets, and CO₂ against each fuel's
 * stoichiometric maximum.
 */
export function createVentingRequestSchema(
  c: VentingConstants = DEFAULT_VENTING_CONSTANTS,
): z.ZodType<VentingRequestV1, z.ZodTypeDef, unknown> {
  return z.object({
    appliances: z.array(ApplianceSpecSchema).min(MIN_APPLIANCES).max(MAX_APPLIANCES),
    connector: VentSegmentSchema,
    manifold: VentSegmentSchema.optional(),
    ambientTempF: z.number().min(-60).max(130),
    barometricPressureInHg: z.number().min(15).max(32),
    preferences: PreferencesSchema,
  }).superRefine((req, ctx) => {
    const maxOutlet = Math.max(...req.appliances.map(a => a.outletDiameterIn));

    if (req.connector.diameterIn < maxOutlet) {
      customIssue(ctx, 'connector_diameter', ['connector', 'diameterIn'],
        `Connector diameter ${req.connector.diameterIn}" is smaller than the largest appliance outlet (${maxOutlet}").`);
    }
    if (req.manifold && req.manifold.diameterIn < maxOutlet) {
      customIssue(ctx, 'manifold_diameter', ['manifold', 'diameterIn'],
        `Manifold diameter ${req.manifold.diameterIn}" is smaller than the largest appliance outlet (${maxOutlet}").`);
    }

    req.appliances.forEach((appliance, i) => {
      const { co2Pct } = resolveFlueConditions(appliance, c);
      const stoich = c.fuels[appliance.fuel].stoichiometricCo2Pct;
      if (co2Pct > stoich) {
        customIssue(ctx, 'co2_exceeds_stoichiometric', ['appliances', i, 'co2Pct'],
          `CO₂ ${co2Pct}% exceeds the ${stoich}% stoichiometric maximum for ${c.fuels[appliance.fuel].label}.`);
      }
    });
  });
}

export const VentingRequestSchema = createVentingRequestSchema();

const VALIDATION_CODES: readonly ValidationErrorCode[] = [
  'appliance_count',
  'connector_diameter',
  'manifold_diameter',
  'missing_field',
  'out_of_range',
  'co2_exceeds_stoichiometric',
];

function isValidationErrorCode(value: unknown): value is ValidationErrorCode {
  return VALIDATION_CODES.some(code => code === value);
}

export function toValidationError(issue: z.ZodIssue): ValidationError {
  const path = issue.path.join('.');
  let code: ValidationErrorCode = 'out_of_range';

  if (path === 'appliances' && (issue.code === z.ZodIssueCode.too_small || issue.code === z.ZodIssueCode.too_big)) {
    code = 'appliance_count';
  } else if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    code = 'missing_field';
  } else if (issue.code === z.ZodIssueCode.custom) {
    const customCode: unknown = issue.params?.code;
    if (isValidationErrorCode(customCode)) code = customCode;
  }

  return { code, path, message: issue.message };
}

export type VentingRequestValidation =
  | { ok: true; request: VentingRequestV1 }
  | { ok: false; errors: ValidationError[] };

/** Parse an untrusted request. Never coerces: every problem comes back as a ValidationError. */
export function validateVentingRequest(
  raw: unknown,
  schema: z.ZodType<VentingRequestV1, z.ZodTypeDef, unknown> = VentingRequestSchema,
): VentingRequestValidation {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return { ok: true, request: parsed.data };
  return { ok: false, errors: parsed.error.issues.map(toValidationError) };
}
