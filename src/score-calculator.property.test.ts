// Property-Based Test: confidence and nervousness form a bounded complementary pair

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { createScoredSample, dominantEmotion, scoreEmotions } from "./score-calculator.js";
import { EMOTION_LABELS, type EmotionVector } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryProbability = (): fc.Arbitrary<number> =>
  fc.double({ min: 0, max: 100, noNaN: true, noDefaultInfinity: true });

/** Independent probabilities per label; the sum-to-100 contract is not needed here. */
const arbitraryEmotionVector = (): fc.Arbitrary<EmotionVector> =>
  fc.record({
    angry: arbitraryProbability(),
    disgust: arbitraryProbability(),
    fear: arbitraryProbability(),
    happy: arbitraryProbability(),
    sad: arbitraryProbability(),
    surprise: arbitraryProbability(),
    neutral: arbitraryProbability(),
  });

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("Property: score pair is bounded and complementary", () => {
  it("both scores stay within [0, 100]", () => {
    fc.assert(
      fc.property(arbitraryEmotionVector(), (emotions) => {
        const { confidencePct, nervousnessPct } = scoreEmotions(emotions);
        expect(confidencePct).toBeGreaterThanOrEqual(0);
        expect(confidencePct).toBeLessThanOrEqual(100);
        expect(nervousnessPct).toBeGreaterThanOrEqual(0);
        expect(nervousnessPct).toBeLessThanOrEqual(100);
      }),
      { numRuns: 300 },
    );
  });

  it("the pair sums to 100 within the rounding step", () => {
    fc.assert(
      fc.property(arbitraryEmotionVector(), (emotions) => {
        const { confidencePct, nervousnessPct } = scoreEmotions(emotions);
        expect(Math.abs(confidencePct + nervousnessPct - 100)).toBeLessThanOrEqual(0.1 + 1e-9);
      }),
      { numRuns: 300 },
    );
  });

  it("scoring is deterministic", () => {
    fc.assert(
      fc.property(arbitraryEmotionVector(), (emotions) => {
        expect(scoreEmotions(emotions)).toEqual(scoreEmotions({ ...emotions }));
      }),
    );
  });

  it("the dominant emotion carries the maximum probability", () => {
    fc.assert(
      fc.property(arbitraryEmotionVector(), (emotions) => {
        const dominant = dominantEmotion(emotions);
        for (const label of EMOTION_LABELS) {
          expect(emotions[dominant]).toBeGreaterThanOrEqual(emotions[label]);
        }
      }),
    );
  });

  it("scored samples keep the timestamp they were given", () => {
    fc.assert(
      fc.property(fc.nat({ max: 36_000 }), arbitraryEmotionVector(), (timestamp, emotions) => {
        expect(createScoredSample(timestamp, emotions).timestamp).toBe(timestamp);
      }),
    );
  });
});
