export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample variance; zero below two samples. */
export function variance(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  return values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
}

export function pooledStdDev(a: readonly number[], b: readonly number[]): number {
  return Math.sqrt((variance(a) + variance(b)) / 2);
}

/**
 * Share of the outcome delta attributable to the intervention rather than
 * rollout noise, in [0, 1]. A single sample has no noise estimate, so any
 * non-zero delta is attributed fully.
 */
export function causalAttribution(delta: number, stdDev: number, samples: number): number {
  const magnitude = Math.abs(delta);
  if (samples <= 1) return magnitude > 0 ? 1 : 0;
  if (magnitude === 0 && stdDev === 0) return 0;
  return magnitude / (magnitude + stdDev);
}

/** Confidence grows with samples and shrinks with rollout spread. */
export function analysisConfidence(stdDev: number, samples: number): number {
  return clamp01(1 - 2 * stdDev) * (samples / (samples + 1));
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
