// Poise Meter - Report assembly
// Turns a summary plus its raw samples into the structured report shared by
// batch and live modes, and into plot-ready chart series.

import { maxOf, mean } from "./aggregator.js";
import { completeEmotionVector } from "./score-calculator.js";
import {
  EMOTION_LABELS,
  type AnalysisMode,
  type Assessment,
  type AssessmentLevel,
  type ChartSeries,
  type EmotionBreakdownEntry,
  type EmotionVector,
  type Report,
  type ScoredSample,
  type StatsSummary,
} from "./types.js";

// ─── Narrative Rules ────────────────────────────────────────────────────────────

export function describeConfidence(confidenceMedian: number): string {
  if (confidenceMedian > 70) return "consistently high confidence levels";
  if (confidenceMedian > 50) return "moderate to high confidence levels";
  if (confidenceMedian > 30) return "moderate confidence with some uncertainty";
  return "lower confidence levels";
}

export function describeNervousness(nervousnessMedian: number): string {
  if (nervousnessMedian > 60) return "notably high";
  if (nervousnessMedian > 40) return "moderately elevated";
  return "relatively low";
}

/** Judged on the spread of the confidence signal. */
export function describeStability(confidenceStd: number): string {
  if (confidenceStd > 20) return "high emotional variability";
  if (confidenceStd > 10) return "moderate emotional consistency";
  return "stable emotional state";
}

export function levelOf(median: number): AssessmentLevel {
  if (median > 60) return "High";
  if (median > 40) return "Medium";
  return "Low";
}

export function assess(summary: StatsSummary): Assessment {
  return {
    confidenceLevel: levelOf(summary.confidenceMedian),
    nervousnessLevel: levelOf(summary.nervousnessMedian),
    confidenceDescription: describeConfidence(summary.confidenceMedian),
    nervousnessDescription: describeNervousness(summary.nervousnessMedian),
    stabilityDescription: describeStability(summary.confidenceStd),
  };
}

// ─── Emotion Breakdown ──────────────────────────────────────────────────────────

/** Mean and peak of every probability column, in classifier label order. */
export function emotionBreakdown(samples: readonly ScoredSample[]): EmotionBreakdownEntry[] {
  return EMOTION_LABELS.map((label) => {
    const column = samples.map((s) => s.rawEmotions[label]);
    return {
      label,
      mean: column.length > 0 ? mean(column) : 0,
      peak: column.length > 0 ? maxOf(column) : 0,
    };
  });
}

// ─── Report ─────────────────────────────────────────────────────────────────────

export interface ReportMeta {
  mode: AnalysisMode;
  /** Clip name or camera label. */
  source?: string | null;
  /** Wall-clock anchor of a live session. */
  startedAt?: Date | null;
  generatedAt?: Date;
}

export function buildReport(
  samples: readonly ScoredSample[],
  summary: StatsSummary,
  meta: ReportMeta,
): Report {
  const duration = summary.totalDuration;
  const startedAt = meta.startedAt ?? null;

  return {
    mode: meta.mode,
    source: meta.source ?? null,
    generatedAt: (meta.generatedAt ?? new Date()).toISOString(),
    sessionInfo: {
      sampleCount: summary.sampleCount,
      durationSeconds: duration,
      analysisRateHz: duration > 0 ? summary.sampleCount / duration : 0,
      startedAt: startedAt ? startedAt.toISOString() : null,
      endedAt: startedAt ? new Date(startedAt.getTime() + duration * 1000).toISOString() : null,
    },
    summary,
    emotionBreakdown: emotionBreakdown(samples),
    assessment: assess(summary),
  };
}

// ─── Chart Series ───────────────────────────────────────────────────────────────

export function buildChartSeries(samples: readonly ScoredSample[], summary: StatsSummary): ChartSeries {
  const emotionMeans: EmotionVector = completeEmotionVector({});
  for (const entry of emotionBreakdown(samples)) {
    emotionMeans[entry.label] = entry.mean;
  }

  return {
    timestamps: samples.map((s) => s.timestamp),
    confidence: samples.map((s) => s.confidencePct),
    nervousness: samples.map((s) => s.nervousnessPct),
    confidenceMedian: summary.confidenceMedian,
    nervousnessMedian: summary.nervousnessMedian,
    emotionMeans,
  };
}
