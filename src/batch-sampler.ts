/**
 * BatchSampler — fixed-interval extraction over a finite, seekable clip.
 *
 * Seeks to t = 0, 1, 2, … seconds (regardless of the clip's native frame
 * rate), classifies one frame per step, and appends one scored sample per
 * step. A read failure or end of stream stops extraction and keeps what was
 * collected. A classification failure is replaced by the configured failure
 * policy (neutral stand-in by default) so the time axis stays contiguous.
 */

import { firstFace } from "./emotion-classifier.js";
import { SourceUnavailableError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import {
  FallbackToNeutral,
  createScoredSample,
  type ClassificationFailurePolicy,
} from "./score-calculator.js";
import type { EmotionClassifier, ScoredSample, VideoSource } from "./types.js";

export type ExtractionEndReason = "completed" | "end_of_stream" | "read_failure";

export interface BatchExtraction {
  samples: ScoredSample[];
  fps: number;
  frameCount: number;
  durationSeconds: number;
  endReason: ExtractionEndReason;
}

export interface BatchSamplerOptions {
  /** Seconds of clip time between samples. Default: 1. */
  intervalSeconds?: number;
  failurePolicy?: ClassificationFailurePolicy;
  logger?: Logger;
}

export class BatchSampler {
  private readonly classifier: EmotionClassifier;
  private readonly intervalSeconds: number;
  private readonly failurePolicy: ClassificationFailurePolicy;
  private readonly logger: Logger;

  constructor(classifier: EmotionClassifier, options: BatchSamplerOptions = {}) {
    const intervalSeconds = options.intervalSeconds ?? 1;
    if (!(intervalSeconds > 0)) {
      throw new Error(`Invalid sampling interval: ${intervalSeconds}. Must be greater than 0.`);
    }
    this.classifier = classifier;
    this.intervalSeconds = intervalSeconds;
    this.failurePolicy = options.failurePolicy ?? FallbackToNeutral;
    this.logger = options.logger ?? createLogger("BatchSampler");
  }

  /**
   * Sample the whole clip. The source is not released here; its opener owns it.
   * @throws SourceUnavailableError when the clip reports no usable frame rate.
   */
  async extract(source: VideoSource): Promise<BatchExtraction> {
    const { fps, frameCount } = source;
    if (!Number.isFinite(fps) || fps <= 0) {
      throw new SourceUnavailableError(`Video reports an unusable frame rate: ${fps}`);
    }
    if (!Number.isFinite(frameCount) || frameCount < 0) {
      throw new SourceUnavailableError(`Video reports an unusable frame count: ${frameCount}`);
    }

    const durationSeconds = frameCount / fps;
    this.logger.info(`Video FPS: ${fps}, total frames: ${frameCount}, duration: ${durationSeconds.toFixed(2)}s`);

    const samples: ScoredSample[] = [];
    let endReason: ExtractionEndReason = "completed";

    for (let step = 0; step * this.intervalSeconds < durationSeconds; step++) {
      const timestamp = step * this.intervalSeconds;

      let frame: Buffer | null;
      try {
        frame = await source.seekAndRead(timestamp);
      } catch (err) {
        this.logger.warn(`Frame read failed at ${timestamp}s, keeping ${samples.length} samples: ${errorMessage(err)}`);
        endReason = "read_failure";
        break;
      }
      if (frame === null) {
        endReason = "end_of_stream";
        break;
      }

      const sample = await this.scoreFrame(frame, timestamp, samples[samples.length - 1] ?? null);
      samples.push(sample);
    }

    this.logger.info(`Extraction finished (${endReason}): ${samples.length} samples`);
    return { samples, fps, frameCount, durationSeconds, endReason };
  }

  private async scoreFrame(
    frame: Buffer,
    timestamp: number,
    previous: ScoredSample | null,
  ): Promise<ScoredSample> {
    try {
      const emotions = firstFace(await this.classifier.classify(frame));
      return createScoredSample(timestamp, emotions);
    } catch (err) {
      this.logger.warn(`Error analyzing frame at ${timestamp}s: ${errorMessage(err)}`);
      return this.failurePolicy.recover(timestamp, previous);
    }
  }
}
