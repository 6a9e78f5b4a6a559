/**
 * Maps one emotion-probability vector to a confidence/nervousness pair.
 *
 * Positive labels contribute `p * w` to confidence, negative labels
 * contribute `p * (1 - w)` to nervousness, and the two raw sums are
 * normalized to percentages that add up to 100.
 */

import {
  EMOTION_LABELS,
  type EmotionLabel,
  type EmotionVector,
  type ScorePair,
  type ScoredSample,
} from "./types.js";

// ─── Weights ────────────────────────────────────────────────────────────────────

export const CONFIDENCE_LABELS: readonly EmotionLabel[] = ["happy", "neutral", "surprise"];
export const NERVOUSNESS_LABELS: readonly EmotionLabel[] = ["fear", "sad", "angry", "disgust"];

export const CONFIDENCE_WEIGHTS: Readonly<Partial<Record<string, number>>> = {
  happy: 0.8,
  neutral: 0.6,
  surprise: 0.5,
  angry: 0.3,
  disgust: 0.2,
  fear: 0.1,
  sad: 0.2,
};

/** Weight for labels missing from the table. */
export const DEFAULT_WEIGHT = 0.5;

/** Pair returned when no weighted emotion carries any probability. */
export const NEUTRAL_SCORE: Readonly<ScorePair> = Object.freeze({
  confidencePct: 50.0,
  nervousnessPct: 50.0,
});

function weightFor(label: string): number {
  return CONFIDENCE_WEIGHTS[label] ?? DEFAULT_WEIGHT;
}

/** Round to one decimal place; exact ties go to the even neighbour (56.25 → 56.2, 43.75 → 43.8). */
export function roundToTenth(value: number): number {
  const scaled = value * 10;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 10;
  }
  return Math.round(scaled) / 10;
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

/**
 * Score an emotion vector. The all-zero vector yields exactly 50/50; any
 * other vector yields a pair summing to 100 within the 0.1 rounding step.
 */
export function scoreEmotions(emotions: Readonly<Partial<Record<EmotionLabel, number>>>): ScorePair {
  let rawConfidence = 0;
  for (const label of CONFIDENCE_LABELS) {
    rawConfidence += (emotions[label] ?? 0) * weightFor(label);
  }

  let rawNervousness = 0;
  for (const label of NERVOUSNESS_LABELS) {
    rawNervousness += (emotions[label] ?? 0) * (1 - weightFor(label));
  }

  const total = rawConfidence + rawNervousness;
  if (!(total > 0)) {
    return { ...NEUTRAL_SCORE };
  }

  return {
    confidencePct: roundToTenth((rawConfidence / total) * 100),
    nervousnessPct: roundToTenth((rawNervousness / total) * 100),
  };
}

/** Label with the highest probability; ties go to the earlier label in classifier order. */
export function dominantEmotion(emotions: Readonly<Partial<Record<EmotionLabel, number>>>): EmotionLabel {
  let best: EmotionLabel = EMOTION_LABELS[0];
  let bestValue = -Infinity;
  for (const label of EMOTION_LABELS) {
    const value = emotions[label] ?? 0;
    if (value > bestValue) {
      best = label;
      bestValue = value;
    }
  }
  return best;
}

/** Fill labels the classifier omitted with 0. */
export function completeEmotionVector(emotions: Readonly<Partial<Record<EmotionLabel, number>>>): EmotionVector {
  return {
    angry: emotions.angry ?? 0,
    disgust: emotions.disgust ?? 0,
    fear: emotions.fear ?? 0,
    happy: emotions.happy ?? 0,
    sad: emotions.sad ?? 0,
    surprise: emotions.surprise ?? 0,
    neutral: emotions.neutral ?? 0,
  };
}

export function createScoredSample(
  timestamp: number,
  emotions: Readonly<Partial<Record<EmotionLabel, number>>>,
): ScoredSample {
  const rawEmotions = Object.freeze(completeEmotionVector(emotions));
  const { confidencePct, nervousnessPct } = scoreEmotions(rawEmotions);
  return Object.freeze({
    timestamp,
    confidencePct,
    nervousnessPct,
    dominantEmotion: dominantEmotion(rawEmotions),
    rawEmotions,
  });
}

// ─── Classification Failure Policies ────────────────────────────────────────────

/** Decides which sample stands in for a frame whose classification failed. */
export interface ClassificationFailurePolicy {
  readonly name: "fallback-to-neutral" | "retain-previous";
  recover(timestamp: number, previous: ScoredSample | null): ScoredSample;
}

export function neutralSample(timestamp: number): ScoredSample {
  const sample: ScoredSample = {
    timestamp,
    confidencePct: NEUTRAL_SCORE.confidencePct,
    nervousnessPct: NEUTRAL_SCORE.nervousnessPct,
    dominantEmotion: "neutral",
    rawEmotions: Object.freeze(completeEmotionVector({ neutral: 100 })),
  };
  return Object.freeze(sample);
}

/** Batch mode: every timestamp gets an independent neutral stand-in. */
export const FallbackToNeutral: ClassificationFailurePolicy = {
  name: "fallback-to-neutral",
  recover: (timestamp) => neutralSample(timestamp),
};

/** Live mode: the last known reading carries over to the new tick. */
export const RetainPrevious: ClassificationFailurePolicy = {
  name: "retain-previous",
  recover: (timestamp, previous) =>
    previous === null ? neutralSample(timestamp) : Object.freeze({ ...previous, timestamp }),
};
