/** One sampled point on a fan performance curve. */
export interface CurveSample {
  flowCfm: number;
  pressureInWc: number;
}

export interface CurveDomain {
  minFlowCfm: number;
  maxFlowCfm: number;
}

export type CurveInterpolation =
  | { kind: 'in_domain'; pressureInWc: number }
  | { kind: 'below_domain'; domain: CurveDomain }
  | { kind: 'above_domain'; domain: CurveDomain };

/** Sampled flow range of a curve. Samples must already be sorted by flow. */
export function curveDomain(samples: readonly CurveSample[]): CurveDomain {
  if (samples.length === 0) {
    throw new Error('curveDomain: a fan curve needs at least one sample');
  }
  return {
    minFlowCfm: samples[0].flowCfm,
    maxFlowCfm: samples[samples.length - 1].flowCfm,
  };
}

/**
 * Piecewise-linear pressure at `flowCfm`.
 *
 * Flows outside [first, last] sampled flow are reported as out of domain and
 * never extrapolated. Both endpoints are inside the domain.
 */
export function interpolateCurve(samples: readonly CurveSample[], flowCfm: number): CurveInterpolation {
  const domain = curveDomain(samples);
  if (flowCfm < domain.minFlowCfm) return { kind: 'below_domain', domain };
  if (flowCfm > domain.maxFlowCfm) return { kind: 'above_domain', domain };

  for (let i = 0; i < samples.length - 1; i++) {
    const lo = samples[i];
    const hi = samples[i + 1];
    if (flowCfm <= hi.flowCfm) {
      const t = (flowCfm - lo.flowCfm) / (hi.flowCfm - lo.flowCfm);
      return { kind: 'in_domain', pressureInWc: lo.pressureInWc + t * (hi.pressureInWc - lo.pressureInWc) };
    }
  }
  // Single-sample curve whose only flow equals flowCfm.
  return { kind: 'in_domain', pressureInWc: samples[samples.length - 1].pressureInWc };
}
