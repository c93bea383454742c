import type {
  ApplianceCountBucket,
  ControllerOutcome,
  ControllerSubsystems,
} from '../schema/SelectionV1';

interface ControllerModel {
  id: string;
  description: string;
}

const CONTROLLERS = {
  DC100: { id: 'DC100', description: 'Single-appliance LCD controller' },
  DC150: { id: 'DC150', description: 'Two-appliance LCD controller' },
  DC250: { id: 'DC250', description: 'Multi-appliance controller, 4" touchscreen' },
  DC300: { id: 'DC300', description: 'Multi-appliance controller, 7" touchscreen' },
  DC350: { id: 'DC350', description: 'Large-system controller, 7" touchscreen, three-subsystem I/O' },
} as const satisfies Record<string, ControllerModel>;

interface ControllerRule {
  touchscreen: boolean;
  buckets: readonly ApplianceCountBucket[];
  /** Inclusive bounds on the number of active subsystems. */
  subsystemCount?: { min?: number; max?: number };
  model: ControllerModel;
}

/** First match wins. Non-touchscreen systems above two appliances fall through to a touchscreen unit. */
const CONTROLLER_RULES: readonly ControllerRule[] = [
  { touchscreen: true,  buckets: ['1', '2', '3-4'], model: CONTROLLERS.DC300 },
  { touchscreen: true,  buckets: ['5-6'], subsystemCount: { min: 3 }, model: CONTROLLERS.DC350 },
  { touchscreen: true,  buckets: ['5-6'], model: CONTROLLERS.DC250 },
  { touchscreen: false, buckets: ['1'], subsystemCount: { max: 1 }, model: CONTROLLERS.DC100 },
  { touchscreen: false, buckets: ['1', '2'], model: CONTROLLERS.DC150 },
  { touchscreen: false, buckets: ['3-4', '5-6'], model: CONTROLLERS.DC250 },
];

/** Suffix letters, in the order they are appended. */
const SUFFIX_ORDER: ReadonlyArray<[keyof ControllerSubsystems, string]> = [
  ['overdraftControl', 'O'],
  ['supplyAir', 'P'],
  ['poweredInducer', 'V'],
];

export function applianceCountBucket(count: number): ApplianceCountBucket {
  if (count <= 1) return '1';
  if (count === 2) return '2';
  if (count <= 4) return '3-4';
  return '5-6';
}

export function configurationSuffix(subsystems: ControllerSubsystems): string {
  return SUFFIX_ORDER.filter(([key]) => subsystems[key]).map(([, letter]) => letter).join('');
}

/**
 * Controller lookup keyed by appliance-count bucket, active subsystems and
 * touchscreen preference. No active subsystem means nothing to control.
 */
export function selectController(
  applianceCount: number,
  subsystems: ControllerSubsystems,
  touchscreen: boolean,
): ControllerOutcome {
  const suffix = configurationSuffix(subsystems);
  if (suffix === '') {
    return { kind: 'none', reason: 'No powered inducer, overdraft control or supply air required.' };
  }

  const bucket = applianceCountBucket(applianceCount);
  const count = suffix.length;
  const rule = CONTROLLER_RULES.find(r =>
    r.touchscreen === touchscreen &&
    r.buckets.includes(bucket) &&
    count >= (r.subsystemCount?.min ?? 0) &&
    count <= (r.subsystemCount?.max ?? Infinity),
  );
  if (!rule) {
    throw new Error(`selectController: no controller rule for bucket ${bucket}, touchscreen=${touchscreen}`);
  }

  return {
    kind: 'selected',
    baseModel: rule.model.id,
    suffix,
    model: `${rule.model.id}-${suffix}`,
    description: rule.model.description,
    bucket,
    subsystems,
  };
}
