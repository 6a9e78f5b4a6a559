/**
 * StreamSampler — cancellable live sampling loop over a camera-like source.
 *
 * Owns the session: the bounded sliding window used for live display, the
 * unbounded history used for end-of-session reporting, and the time origin.
 * Observers receive frozen samples and fresh window arrays, never the
 * sampler's own buffers.
 *
 * State machine:
 *   IDLE → RUNNING:        start()
 *   RUNNING → RESETTING:   reset() while an iteration is in flight
 *   RESETTING → RUNNING:   in-flight iteration finished, reset applied
 *   RUNNING → STOPPED:     stop(), or a fatal frame read failure
 *   STOPPED → RUNNING:     start() (begins a fresh session)
 *   any → IDLE:            dispose()
 */

import { v4 as uuidv4 } from "uuid";
import { mean, summarize } from "./aggregator.js";
import { firstFace } from "./emotion-classifier.js";
import { FrameReadError, SourceUnavailableError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { buildReport } from "./report-builder.js";
import { RingBuffer } from "./ring-buffer.js";
import {
  RetainPrevious,
  createScoredSample,
  type ClassificationFailurePolicy,
} from "./score-calculator.js";
import {
  StreamState,
  type Deferred,
  type EmotionClassifier,
  type EmotionVector,
  type LiveSource,
  type LiveSourceOpener,
  type Report,
  type ScoredSample,
  type StatsSummary,
  type StreamObserver,
  type StreamSampleEvent,
} from "./types.js";
import { createDeferred } from "./utils/deferred.js";

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface StreamSamplerDeps {
  classifier: EmotionClassifier;
  openLive: LiveSourceOpener;
}

export interface StreamSamplerOptions {
  deviceIndex?: number;
  /** Sleep between iterations. Default: 500 ms (~2 samples/second). */
  intervalMs?: number;
  /** Sliding window capacity. Default: 60. */
  windowCapacity?: number;
  failurePolicy?: ClassificationFailurePolicy;
  logger?: Logger;
  sessionId?: string;
  /** Wall clock in ms. Injected by tests. */
  now?: () => number;
  /** Replaces the interruptible timer between iterations. Injected by tests. */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_STREAM_INTERVAL_MS = 500;
export const DEFAULT_WINDOW_CAPACITY = 60;

// ─── StreamSampler ──────────────────────────────────────────────────────────────

export class StreamSampler {
  readonly sessionId: string;

  private readonly deps: StreamSamplerDeps;
  private readonly deviceIndex: number;
  private readonly intervalMs: number;
  private readonly failurePolicy: ClassificationFailurePolicy;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly customSleep: ((ms: number) => Promise<void>) | null;

  private state: StreamState = StreamState.IDLE;
  private opening = false;
  /** Settles when an in-progress openLive() finishes, successfully or not. */
  private openingDone: Deferred<void> | null = null;
  private cancelOpen = false;
  private readonly window: RingBuffer<ScoredSample>;
  private history: ScoredSample[] = [];
  private previous: ScoredSample | null = null;
  private originMs: number | null = null;

  private stopRequested = false;
  private iterationInFlight = false;
  private pendingReset: Deferred<void> | null = null;
  private loopPromise: Promise<void> | null = null;
  private wakeSleeper: (() => void) | null = null;
  private readonly observers = new Set<StreamObserver>();

  constructor(deps: StreamSamplerDeps, options: StreamSamplerOptions = {}) {
    this.deps = deps;
    this.deviceIndex = options.deviceIndex ?? 0;
    this.intervalMs = options.intervalMs ?? DEFAULT_STREAM_INTERVAL_MS;
    this.failurePolicy = options.failurePolicy ?? RetainPrevious;
    this.logger = options.logger ?? createLogger("StreamSampler");
    this.sessionId = options.sessionId ?? uuidv4();
    this.now = options.now ?? Date.now;
    this.customSleep = options.sleep ?? null;
    this.window = new RingBuffer<ScoredSample>(options.windowCapacity ?? DEFAULT_WINDOW_CAPACITY);
  }

  // ─── Accessors ────────────────────────────────────────────────────────────────

  get currentState(): StreamState {
    return this.state;
  }

  /** Wall-clock time origin of the current session, or null before the first start. */
  get startedAt(): Date | null {
    return this.originMs === null ? null : new Date(this.originMs);
  }

  get latestSample(): ScoredSample | null {
    return this.previous;
  }

  /** Copy of the sliding window, oldest first. */
  getWindow(): ScoredSample[] {
    return this.window.toArray();
  }

  /** Copy of the full session history. */
  getHistory(): ScoredSample[] {
    return [...this.history];
  }

  /** @throws EmptyInputError when the session has no samples yet. */
  summarize(): StatsSummary {
    return summarize(this.history);
  }

  /** @throws EmptyInputError when the session has no samples yet. */
  buildReport(): Report {
    const summary = summarize(this.history);
    return buildReport(this.history, summary, {
      mode: "stream",
      source: `camera ${this.deviceIndex}`,
      startedAt: this.startedAt,
    });
  }

  subscribe(observer: StreamObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  // ─── Lifecycle ────────────────────────────────────────────────────────────────

  /**
   * Open the live source and launch the sampling loop. Starts a fresh
   * session: window and history are cleared and the time origin is set.
   *
   * @throws Error if the sampler is already running
   * @throws SourceUnavailableError if the live source cannot be opened
   */
  async start(): Promise<void> {
    if (this.opening || this.state === StreamState.RUNNING || this.state === StreamState.RESETTING) {
      throw new Error(`Cannot start: stream sampler is already "${this.state}".`);
    }

    this.opening = true;
    const opened = createDeferred<void>();
    this.openingDone = opened;
    let cancelled = false;
    let source: LiveSource;
    try {
      source = await this.deps.openLive(this.deviceIndex);
    } catch (err) {
      this.logger.error(`Could not access camera ${this.deviceIndex}: ${errorMessage(err)}`);
      throw err instanceof SourceUnavailableError
        ? err
        : new SourceUnavailableError(`Could not access camera ${this.deviceIndex}: ${errorMessage(err)}`, { cause: err });
    } finally {
      this.opening = false;
      this.openingDone = null;
      cancelled = this.cancelOpen;
      this.cancelOpen = false;
      opened.resolve();
    }

    if (cancelled) {
      source.release();
      this.logger.info(`Session ${this.sessionId}: stop requested while opening camera ${this.deviceIndex}`);
      return;
    }

    this.clearSession();
    this.stopRequested = false;
    this.transition(StreamState.RUNNING);
    this.logger.info(`Session ${this.sessionId} started on camera ${this.deviceIndex}`);

    this.loopPromise = this.runLoop(source);
  }

  /**
   * Ask the loop to exit at its next iteration boundary and wait for it.
   * The in-flight iteration completes; the live source is released.
   */
  async stop(): Promise<void> {
    if (this.opening && this.openingDone !== null) {
      this.cancelOpen = true;
      await this.openingDone.promise;
      return;
    }
    if (this.loopPromise === null) return;
    this.stopRequested = true;
    this.wakeSleeper?.();
    await this.loopPromise;
  }

  /**
   * Clear window and history and re-anchor the time origin. While an
   * iteration is in flight the reset waits for that iteration's append, so
   * the loop never writes into a half-cleared session.
   */
  reset(): Promise<void> {
    if (this.iterationInFlight) {
      if (this.pendingReset === null) {
        this.pendingReset = createDeferred<void>();
        this.transition(StreamState.RESETTING);
      }
      return this.pendingReset.promise;
    }

    this.clearSession();
    return Promise.resolve();
  }

  /** Resolves once the loop has exited (immediately if it never ran). */
  async waitUntilStopped(): Promise<void> {
    if (this.loopPromise !== null) {
      await this.loopPromise;
    }
  }

  /** Stop, drop all session data and observers, and return to IDLE. */
  async dispose(): Promise<void> {
    await this.stop();
    this.window.clear();
    this.history = [];
    this.previous = null;
    this.originMs = null;
    this.loopPromise = null;
    this.transition(StreamState.IDLE);
    this.observers.clear();
  }

  // ─── Loop ─────────────────────────────────────────────────────────────────────

  private async runLoop(source: LiveSource): Promise<void> {
    try {
      while (!this.stopRequested) {
        this.iterationInFlight = true;
        try {
          await this.runIteration(source);
        } finally {
          this.iterationInFlight = false;
        }
        this.applyPendingReset();

        if (this.stopRequested) break;
        await this.pause();
      }
    } catch (err) {
      if (this.stopRequested) {
        this.logger.info(`Session ${this.sessionId}: source closed during stop (${errorMessage(err)})`);
        return;
      }
      const message = err instanceof FrameReadError
        ? `Failed to capture frame: ${err.message}`
        : `Real-time analysis error: ${errorMessage(err)}`;
      this.logger.error(`Session ${this.sessionId}: ${message}`);
      this.notify((o) => o.onError?.(message));
    } finally {
      this.applyPendingReset();
      source.release();
      this.logFinalResults();
      if (this.state !== StreamState.IDLE) {
        this.transition(StreamState.STOPPED);
      }
    }
  }

  private async runIteration(source: LiveSource): Promise<void> {
    const frame = await source.read();

    let emotions: EmotionVector | null = null;
    try {
      emotions = firstFace(await this.deps.classifier.classify(frame));
    } catch (err) {
      this.logger.warn(`Emotion analysis error, keeping previous reading: ${errorMessage(err)}`);
    }

    const timestamp = this.elapsedSeconds();
    const sample = emotions !== null
      ? createScoredSample(timestamp, emotions)
      : this.failurePolicy.recover(timestamp, this.previous);

    this.previous = sample;
    this.window.push(sample);
    this.history.push(sample);

    const event: StreamSampleEvent = { frame, sample, window: this.window.toArray() };
    this.notify((o) => o.onSample?.(event));
  }

  private pause(): Promise<void> {
    if (this.customSleep !== null) {
      return this.customSleep(this.intervalMs);
    }
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wakeSleeper = null;
        resolve();
      }, this.intervalMs);
      this.wakeSleeper = () => {
        clearTimeout(timer);
        this.wakeSleeper = null;
        resolve();
      };
    });
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────────

  private elapsedSeconds(): number {
    const origin = this.originMs ?? this.now();
    return Math.max(0, (this.now() - origin) / 1000);
  }

  private clearSession(): void {
    this.window.clear();
    this.history = [];
    this.previous = null;
    this.originMs = this.now();
  }

  private applyPendingReset(): void {
    const pending = this.pendingReset;
    if (pending === null) return;

    this.pendingReset = null;
    this.clearSession();
    if (this.state === StreamState.RESETTING && !this.stopRequested) {
      this.transition(StreamState.RUNNING);
    }
    pending.resolve();
  }

  private transition(next: StreamState): void {
    if (this.state === next) return;
    this.state = next;
    this.notify((o) => o.onStateChange?.(next));
  }

  /** Observer failures are logged and never reach the loop. */
  private notify(deliver: (observer: StreamObserver) => void): void {
    for (const observer of [...this.observers]) {
      try {
        deliver(observer);
      } catch (err) {
        this.logger.warn(`Observer threw: ${errorMessage(err)}`);
      }
    }
  }

  private logFinalResults(): void {
    if (this.history.length === 0) return;
    const last = this.history[this.history.length - 1];
    const avgConfidence = mean(this.history.map((s) => s.confidencePct));
    const avgNervousness = mean(this.history.map((s) => s.nervousnessPct));
    this.logger.info(
      `Final results: ${this.history.length} frames, ${last.timestamp.toFixed(1)}s duration, ` +
        `avg confidence ${avgConfidence.toFixed(1)}%, avg nervousness ${avgNervousness.toFixed(1)}%`,
    );
  }
}
