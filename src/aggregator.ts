// Poise Meter - Summary statistics over a sample table or session history.
// Batch tables and live session histories go through the same code path.

import { EmptyInputError } from "./errors.js";
import type { EmotionLabel, ScoredSample, StatsSummary } from "./types.js";

// ─── Descriptive Statistics ─────────────────────────────────────────────────────

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Middle value; mean of the two middle values for even-length input. */
export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Sample standard deviation (Bessel-corrected, n - 1 denominator).
 * A single value yields 0 rather than NaN.
 */
export function sampleStandardDeviation(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  if (values.length === 1) return 0;
  const m = mean(values);
  let squares = 0;
  for (const v of values) squares += (v - m) ** 2;
  return Math.sqrt(squares / (values.length - 1));
}

export function maxOf(values: readonly number[]): number {
  let best = -Infinity;
  for (const v of values) if (v > best) best = v;
  return best;
}

export function minOf(values: readonly number[]): number {
  let best = Infinity;
  for (const v of values) if (v < best) best = v;
  return best;
}

/** Most frequent value; ties go to the value whose first occurrence comes earliest. */
export function modeByFirstOccurrence<T>(values: readonly T[]): T | undefined {
  const counts = new Map<T, number>(); // Map keeps first-insertion order
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);

  let best: T | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

// ─── Summary ────────────────────────────────────────────────────────────────────

/**
 * Summarize a non-empty sequence of samples.
 * @throws EmptyInputError when `samples` is empty.
 */
export function summarize(samples: readonly ScoredSample[]): StatsSummary {
  if (samples.length === 0) {
    throw new EmptyInputError();
  }

  const confidence = samples.map((s) => s.confidencePct);
  const nervousness = samples.map((s) => s.nervousnessPct);
  const dominant = modeByFirstOccurrence<EmotionLabel>(samples.map((s) => s.dominantEmotion));

  return {
    sampleCount: samples.length,
    confidenceMedian: median(confidence),
    confidenceMean: mean(confidence),
    confidenceStd: sampleStandardDeviation(confidence),
    confidenceMax: maxOf(confidence),
    confidenceMin: minOf(confidence),
    nervousnessMedian: median(nervousness),
    nervousnessMean: mean(nervousness),
    nervousnessStd: sampleStandardDeviation(nervousness),
    nervousnessMax: maxOf(nervousness),
    nervousnessMin: minOf(nervousness),
    totalDuration: maxOf(samples.map((s) => s.timestamp)),
    dominantEmotionOverall: dominant ?? "neutral",
  };
}
