// Poise Meter - File Persistence
// Opt-in export of analysis results to disk: the sample table as CSV plus the
// report as text and JSON. Nothing is written until the client asks for it.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ExportError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import {
  EMOTION_LABELS,
  type AnalysisMode,
  type ExportStatus,
  type Report,
  type ScoredSample,
} from "./types.js";

export const EXPORT_PREFIXES: Record<AnalysisMode, string> = {
  batch: "emotion_data",
  stream: "realtime_emotion_analysis",
};

export const CSV_COLUMNS = [
  "timestamp_seconds",
  "confidence_percentage",
  "nervousness_percentage",
  "dominant_emotion",
  ...EMOTION_LABELS,
] as const;

/** Rows shown at each end of the tabulated preview. */
const PREVIEW_EDGE_ROWS = 10;

// ─── Formatting ─────────────────────────────────────────────────────────────────

/** Local wall-clock stamp in `YYYYMMDD_HHMMSS` form. */
export function formatFileStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function buildExportFileName(prefix: string, date: Date, extension: string): string {
  return `${prefix}_${formatFileStamp(date)}.${extension}`;
}

/** Header row plus one row per sample, newline-terminated. */
export function formatSamplesCsv(samples: readonly ScoredSample[]): string {
  const rows = samples.map((s) =>
    [
      s.timestamp,
      s.confidencePct,
      s.nervousnessPct,
      s.dominantEmotion,
      ...EMOTION_LABELS.map((label) => s.rawEmotions[label]),
    ].join(","),
  );
  return [CSV_COLUMNS.join(","), ...rows].join("\n") + "\n";
}

function formatPreviewRow(s: ScoredSample): string {
  return [
    s.timestamp.toFixed(1).padStart(9),
    s.confidencePct.toFixed(1).padStart(11),
    s.nervousnessPct.toFixed(1).padStart(12),
    `  ${s.dominantEmotion}`,
  ].join("");
}

/**
 * Fixed-width table of timestamp, confidence, nervousness and dominant
 * emotion. Long tables show only the first and last ten rows.
 */
export function formatSamplePreview(samples: readonly ScoredSample[]): string {
  const header = `${"timestamp".padStart(9)}${"confidence".padStart(11)}${"nervousness".padStart(12)}  dominant`;

  if (samples.length <= PREVIEW_EDGE_ROWS * 2) {
    return [header, ...samples.map(formatPreviewRow)].join("\n");
  }

  const omitted = samples.length - PREVIEW_EDGE_ROWS * 2;
  return [
    "First 10 entries:",
    header,
    ...samples.slice(0, PREVIEW_EDGE_ROWS).map(formatPreviewRow),
    "",
    `... [${omitted} rows omitted] ...`,
    "",
    "Last 10 entries:",
    header,
    ...samples.slice(-PREVIEW_EDGE_ROWS).map(formatPreviewRow),
  ].join("\n");
}

function capitalize(label: string): string {
  return label.charAt(0).toUpperCase() + label.slice(1);
}

/** Human-readable report, optionally followed by the tabulated sample preview. */
export function formatReportText(report: Report, samples: readonly ScoredSample[] = []): string {
  const { summary, assessment, sessionInfo } = report;
  const pct = (n: number) => `${n.toFixed(1)}%`;
  const title = report.mode === "batch" ? "VIDEO EMOTION ANALYSIS REPORT" : "REAL-TIME EMOTION ANALYSIS REPORT";

  const lines: string[] = [
    "========================================",
    title,
    "========================================",
    "",
    `Analysis Date: ${report.generatedAt}`,
    `Source: ${report.source ?? "unknown"}`,
    `Total Duration: ${summary.totalDuration.toFixed(1)} seconds`,
    `Frames Analyzed: ${summary.sampleCount}`,
    `Analysis Rate: ${sessionInfo.analysisRateHz.toFixed(2)} samples/second`,
  ];
  if (sessionInfo.startedAt !== null && sessionInfo.endedAt !== null) {
    lines.push(`Session Start: ${sessionInfo.startedAt}`, `Session End: ${sessionInfo.endedAt}`);
  }

  lines.push(
    "",
    "CONFIDENCE METRICS:",
    "------------------",
    `Median Confidence: ${pct(summary.confidenceMedian)}`,
    `Average Confidence: ${pct(summary.confidenceMean)}`,
    `Standard Deviation: ${pct(summary.confidenceStd)}`,
    `Maximum Confidence: ${pct(summary.confidenceMax)}`,
    `Minimum Confidence: ${pct(summary.confidenceMin)}`,
    "",
    "NERVOUSNESS METRICS:",
    "-------------------",
    `Median Nervousness: ${pct(summary.nervousnessMedian)}`,
    `Average Nervousness: ${pct(summary.nervousnessMean)}`,
    `Standard Deviation: ${pct(summary.nervousnessStd)}`,
    `Maximum Nervousness: ${pct(summary.nervousnessMax)}`,
    `Minimum Nervousness: ${pct(summary.nervousnessMin)}`,
    "",
    "OVERALL ASSESSMENT:",
    "------------------",
    `Dominant Emotion: ${summary.dominantEmotionOverall}`,
    `Overall Confidence Level: ${assessment.confidenceLevel}`,
    `Overall Nervousness Level: ${assessment.nervousnessLevel}`,
    `The subject showed ${assessment.confidenceDescription}.`,
    `Nervousness was ${assessment.nervousnessDescription}.`,
    `Emotional pattern: ${assessment.stabilityDescription}.`,
    "",
    "DETAILED EMOTION BREAKDOWN:",
    "--------------------------",
    ...report.emotionBreakdown.map(
      (e) => `${capitalize(e.label)}: ${pct(e.mean)} (avg), ${pct(e.peak)} (peak)`,
    ),
  );

  if (samples.length > 0) {
    lines.push("", "TABULATED DATA SAMPLE:", "-".repeat(44), formatSamplePreview(samples));
  }

  return lines.join("\n") + "\n";
}

// ─── FilePersistence ────────────────────────────────────────────────────────────

/**
 * Output layout, all in one flat directory:
 *   {baseDir}/{prefix}_{YYYYMMDD_HHMMSS}.csv
 *   {baseDir}/{prefix}_report_{YYYYMMDD_HHMMSS}.txt
 *   {baseDir}/{prefix}_report_{YYYYMMDD_HHMMSS}.json
 */
export class FilePersistence {
  private readonly baseDir: string;
  private readonly logger: Logger;

  constructor(baseDir: string = "output", logger: Logger = createLogger("FilePersistence")) {
    this.baseDir = baseDir;
    this.logger = logger;
  }

  get outputDir(): string {
    return this.baseDir;
  }

  /** @throws ExportError when the directory or file cannot be written. */
  async saveSamplesCsv(samples: readonly ScoredSample[], prefix: string, date: Date = new Date()): Promise<string> {
    const path = join(this.baseDir, buildExportFileName(prefix, date, "csv"));
    await this.write(path, formatSamplesCsv(samples));
    return path;
  }

  /**
   * Writes the text and JSON renderings of the report.
   * @returns [textPath, jsonPath]
   * @throws ExportError when either file cannot be written.
   */
  async saveReport(
    report: Report,
    samples: readonly ScoredSample[],
    prefix: string,
    date: Date = new Date(),
  ): Promise<string[]> {
    const reportPrefix = `${prefix}_report`;
    const textPath = join(this.baseDir, buildExportFileName(reportPrefix, date, "txt"));
    const jsonPath = join(this.baseDir, buildExportFileName(reportPrefix, date, "json"));

    await this.write(textPath, formatReportText(report, samples));
    await this.write(jsonPath, JSON.stringify(report, null, 2));
    return [textPath, jsonPath];
  }

  /**
   * Exports the CSV and both report files under the prefix of the report's
   * mode. Never throws: a failure comes back as `{ ok: false, message }`.
   */
  async saveAll(report: Report, samples: readonly ScoredSample[], date: Date = new Date()): Promise<ExportStatus> {
    const prefix = EXPORT_PREFIXES[report.mode];
    try {
      const csvPath = await this.saveSamplesCsv(samples, prefix, date);
      const reportPaths = await this.saveReport(report, samples, prefix, date);
      const paths = [csvPath, ...reportPaths];
      this.logger.info(`Saved ${paths.length} files to ${this.baseDir}`);
      return { ok: true, paths };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn(`Export failed: ${message}`);
      return { ok: false, message };
    }
  }

  private async write(path: string, content: string): Promise<void> {
    try {
      await mkdir(this.baseDir, { recursive: true });
      await writeFile(path, content, "utf-8");
    } catch (err) {
      throw new ExportError(`Could not write ${path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
