/**
 * Unit tests for aggregator.ts
 */

import { describe, it, expect } from "vitest";
import {
  maxOf,
  mean,
  median,
  minOf,
  modeByFirstOccurrence,
  sampleStandardDeviation,
  summarize,
} from "./aggregator.js";
import { EmptyInputError } from "./errors.js";
import type { EmotionLabel, ScoredSample } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeSample(
  timestamp: number,
  confidencePct: number,
  dominantEmotion: EmotionLabel = "neutral",
): ScoredSample {
  return {
    timestamp,
    confidencePct,
    nervousnessPct: 100 - confidencePct,
    dominantEmotion,
    rawEmotions: { angry: 0, disgust: 0, fear: 0, happy: 0, sad: 0, surprise: 0, neutral: 100 },
  };
}

// ─── Descriptive Statistics ─────────────────────────────────────────────────────

describe("descriptive statistics", () => {
  it("median of odd and even-length inputs", () => {
    expect(median([30, 10, 50, 20, 40])).toBe(30);
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it("sample standard deviation uses the n - 1 denominator", () => {
    // squared deviations of [2, 4, 4, 4, 5, 5, 7, 9] from 5 sum to 32; 32 / 7
    expect(sampleStandardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 10);
  });

  it("standard deviation of a single value is 0", () => {
    expect(sampleStandardDeviation([42])).toBe(0);
  });

  it("statistics over no values are NaN", () => {
    expect(mean([])).toBeNaN();
    expect(median([])).toBeNaN();
    expect(sampleStandardDeviation([])).toBeNaN();
  });

  it("maxOf and minOf handle long inputs", () => {
    const values = Array.from({ length: 200_000 }, (_, i) => i % 1000);
    expect(maxOf(values)).toBe(999);
    expect(minOf(values)).toBe(0);
  });

  it("mode ties go to the value seen first", () => {
    expect(modeByFirstOccurrence(["sad", "happy", "happy", "sad"])).toBe("sad");
    expect(modeByFirstOccurrence(["fear", "happy", "happy"])).toBe("happy");
    expect(modeByFirstOccurrence([])).toBeUndefined();
  });
});

// ─── summarize ──────────────────────────────────────────────────────────────────

describe("summarize", () => {
  it("summarizes a five-sample table", () => {
    const samples = [10, 20, 30, 40, 50].map((c, i) => makeSample(i, c));
    const summary = summarize(samples);

    expect(summary.sampleCount).toBe(5);
    expect(summary.confidenceMedian).toBe(30);
    expect(summary.confidenceMean).toBe(30);
    expect(summary.confidenceMax).toBe(50);
    expect(summary.confidenceMin).toBe(10);
    // deviations ±20, ±10, 0 → 1000 / 4 = 250
    expect(summary.confidenceStd).toBeCloseTo(Math.sqrt(250), 10);
    expect(summary.nervousnessMedian).toBe(70);
    expect(summary.nervousnessMax).toBe(90);
    expect(summary.nervousnessMin).toBe(50);
    expect(summary.totalDuration).toBe(4);
  });

  it("reports the most frequent dominant emotion, first occurrence winning ties", () => {
    const samples = [
      makeSample(0, 50, "fear"),
      makeSample(1, 50, "happy"),
      makeSample(2, 50, "happy"),
      makeSample(3, 50, "fear"),
    ];
    expect(summarize(samples).dominantEmotionOverall).toBe("fear");
  });

  it("uses the largest timestamp as the total duration", () => {
    const samples = [makeSample(0.5, 60), makeSample(1.0, 60), makeSample(1.52, 60)];
    expect(summarize(samples).totalDuration).toBe(1.52);
  });

  it("reports zero spread for a single sample", () => {
    const summary = summarize([makeSample(0, 73.4)]);
    expect(summary.confidenceStd).toBe(0);
    expect(summary.nervousnessStd).toBe(0);
    expect(summary.confidenceMedian).toBe(73.4);
  });

  it("throws EmptyInputError on an empty table", () => {
    expect(() => summarize([])).toThrow(EmptyInputError);
    expect(() => summarize([])).toThrow("No emotion data available");
  });
});
