/**
 * BatchAnalysisJob — one-shot pipeline over a recorded clip.
 *
 * open → extract → summarize → report → chart series → (optional) export,
 * with coarse progress milestones along the way. The job reports exactly one
 * terminal outcome: complete with the full result, or failed with a single
 * message. A partial table is never handed out.
 */

import { summarize } from "./aggregator.js";
import { BatchSampler, type BatchExtraction } from "./batch-sampler.js";
import { errorMessage } from "./errors.js";
import type { FilePersistence } from "./file-persistence.js";
import { createLogger, type Logger } from "./logger.js";
import { buildChartSeries, buildReport } from "./report-builder.js";
import type { ClassificationFailurePolicy } from "./score-calculator.js";
import type {
  ChartSeries,
  EmotionClassifier,
  Report,
  StatsSummary,
  VideoSource,
  VideoSourceOpener,
} from "./types.js";

export interface BatchAnalysisResult {
  extraction: BatchExtraction;
  summary: StatsSummary;
  report: Report;
  chart: ChartSeries;
  /** Files written by the export step; empty when export is off or failed. */
  savedPaths: string[];
}

export interface BatchAnalysisCallbacks {
  onProgress?(percentage: number, message: string): void;
  onLog?(message: string): void;
  onComplete?(result: BatchAnalysisResult): void;
  onError?(message: string): void;
}

export interface BatchAnalysisJobDeps {
  openVideo: VideoSourceOpener;
  classifier: EmotionClassifier;
  /** When present, results are exported at the "Saving results" milestone. */
  filePersistence?: FilePersistence | null;
  logger?: Logger;
  intervalSeconds?: number;
  failurePolicy?: ClassificationFailurePolicy;
}

export class BatchAnalysisJob {
  private readonly deps: BatchAnalysisJobDeps;
  private readonly callbacks: BatchAnalysisCallbacks;
  private readonly logger: Logger;

  constructor(deps: BatchAnalysisJobDeps, callbacks: BatchAnalysisCallbacks = {}) {
    this.deps = deps;
    this.callbacks = callbacks;
    this.logger = deps.logger ?? createLogger("BatchAnalysisJob");
  }

  /**
   * Run the whole pipeline for one clip. Never rejects: failures are
   * delivered through onError and the promise resolves to null.
   */
  async run(path: string): Promise<BatchAnalysisResult | null> {
    let source: VideoSource | null = null;
    try {
      this.log("Initializing video emotion analyzer...");
      source = await this.deps.openVideo(path);

      this.log("Starting emotion extraction from video...");
      this.progress(10, "Extracting emotions from video...");
      const sampler = new BatchSampler(this.deps.classifier, {
        intervalSeconds: this.deps.intervalSeconds,
        failurePolicy: this.deps.failurePolicy,
        logger: this.logger,
      });
      const extraction = await sampler.extract(source);

      this.log("Creating data analysis...");
      this.progress(40, "Processing emotion data...");
      const samples = extraction.samples;

      this.log("Calculating statistics...");
      this.progress(60, "Calculating statistics...");
      const summary = summarize(samples);
      const report = buildReport(samples, summary, { mode: "batch", source: path });

      this.log("Generating visualizations...");
      this.progress(80, "Creating visualizations...");
      const chart = buildChartSeries(samples, summary);

      this.log("Saving results...");
      this.progress(95, "Saving results...");
      const savedPaths = await this.exportResults(report, extraction);

      this.progress(100, "Analysis complete!");
      this.log(
        savedPaths.length > 0
          ? `Analysis completed successfully. Results saved to: ${savedPaths.join(", ")}`
          : `Analysis completed successfully: ${samples.length} samples.`,
      );

      const result: BatchAnalysisResult = { extraction, summary, report, chart, savedPaths };
      this.callbacks.onComplete?.(result);
      return result;
    } catch (err) {
      const message = `Error during analysis: ${errorMessage(err)}`;
      this.logger.error(message);
      this.log(message);
      this.callbacks.onError?.(message);
      this.progress(0, "Analysis failed");
      return null;
    } finally {
      source?.release();
    }
  }

  private async exportResults(report: Report, extraction: BatchExtraction): Promise<string[]> {
    const persistence = this.deps.filePersistence ?? null;
    if (persistence === null) return [];

    const status = await persistence.saveAll(report, extraction.samples);
    if (status.ok) return status.paths;

    this.log(`Could not save results: ${status.message}`);
    return [];
  }

  private progress(percentage: number, message: string): void {
    this.callbacks.onProgress?.(percentage, message);
  }

  private log(message: string): void {
    this.logger.info(message);
    this.callbacks.onLog?.(message);
  }
}
