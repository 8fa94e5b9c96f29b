/**
 * Summary statistics and headway regularity metrics.
 *
 * Every helper returns null rather than NaN or Infinity when the statistic is
 * undefined for its input, so results can be serialized and persisted as-is.
 */

export function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

export function roundOrNull(value: number | null, digits: number): number | null {
  return value === null || !Number.isFinite(value) ? null : round(value, digits);
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Sample standard deviation (n − 1); null below two values. */
export function sampleStdDev(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const avg = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((a, b) => a + (b - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Compute percentiles from an array of numbers (linear interpolation).
 */
export function percentile(arr: readonly number[], p: number): number | null {
  if (arr.length === 0) return null;
  const sorted = [...arr].sort((a, b) => a - b);
  const idx = (p / 100) * (sorted.length - 1);
  const lower = sorted[Math.floor(idx)];
  const upper = sorted[Math.ceil(idx)];
  if (lower === undefined || upper === undefined) return null;
  return lower + (upper - lower) * (idx - Math.floor(idx));
}

export function median(values: readonly number[]): number | null {
  return percentile(values, 50);
}

/** Share of `count` in `total` as a percentage with two decimals. */
export function percentage(count: number, total: number): number | null {
  return total > 0 ? round((count / total) * 100, 2) : null;
}

// ---------------------------------------------------------------------------
// Headway regularity
// ---------------------------------------------------------------------------

export interface HeadwayRegularity {
  excessWaitTimeSecs: number;
  headwayAdherencePct: number; // % within reference + 3 min
  bunchingPct: number; // % with headway < 50% of reference
  gappingPct: number; // % with headway > 150% of reference
  referenceHeadwaySecs: number;
}

/**
 * Regularity of observed headways against a reference headway: the
 * scheduled one when known, else the observed median.
 *
 * Excess wait time is AWT − SWT with AWT = Σh² / 2Σh and SWT = reference/2.
 */
export function computeHeadwayRegularity(
  headwaysSecs: readonly number[],
  scheduledHeadwaySecs: number | null = null
): HeadwayRegularity | null {
  if (headwaysSecs.length === 0) return null;

  const sumH = headwaysSecs.reduce((a, b) => a + b, 0);
  if (sumH <= 0) return null;
  const sumH2 = headwaysSecs.reduce((a, b) => a + b * b, 0);
  const awt = sumH2 / (2 * sumH);

  const reference =
    scheduledHeadwaySecs !== null && scheduledHeadwaySecs > 0
      ? scheduledHeadwaySecs
      : [...headwaysSecs].sort((a, b) => a - b)[Math.floor(headwaysSecs.length / 2)];
  if (reference === undefined || reference <= 0) return null;

  const ewt = Math.max(0, awt - reference / 2);
  const n = headwaysSecs.length;
  const adherent = headwaysSecs.filter((h) => h <= reference + 180).length;
  const bunched = headwaysSecs.filter((h) => h < reference * 0.5).length;
  const gapped = headwaysSecs.filter((h) => h > reference * 1.5).length;

  return {
    excessWaitTimeSecs: Math.round(ewt),
    headwayAdherencePct: round((adherent / n) * 100, 1),
    bunchingPct: round((bunched / n) * 100, 1),
    gappingPct: round((gapped / n) * 100, 1),
    referenceHeadwaySecs: Math.round(reference),
  };
}

export type PerformanceGrade = "A" | "B" | "C" | "D" | "F" | "N/A";

/** Letter grade from on-time percentage: A ≥ 80, B ≥ 60, C ≥ 40, D ≥ 20. */
export function performanceGrade(otpPercentage: number | null): PerformanceGrade {
  if (otpPercentage === null || !Number.isFinite(otpPercentage)) return "N/A";
  if (otpPercentage >= 80) return "A";
  if (otpPercentage >= 60) return "B";
  if (otpPercentage >= 40) return "C";
  if (otpPercentage >= 20) return "D";
  return "F";
}
