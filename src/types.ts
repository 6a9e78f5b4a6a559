// Poise Meter - Shared TypeScript interfaces and types

// ─── Emotions ───────────────────────────────────────────────────────────────────

/** Closed label set produced by the face-emotion classifier, in classifier order. */
export const EMOTION_LABELS = [
  "angry",
  "disgust",
  "fear",
  "happy",
  "sad",
  "surprise",
  "neutral",
] as const;

export type EmotionLabel = (typeof EMOTION_LABELS)[number];

/** Probability per label in [0, 100]; the classifier promises they sum to 100. */
export type EmotionVector = Record<EmotionLabel, number>;

export function isEmotionLabel(value: unknown): value is EmotionLabel {
  return EMOTION_LABELS.some((label) => label === value);
}

// ─── Scored Samples ─────────────────────────────────────────────────────────────

export interface ScorePair {
  confidencePct: number;
  nervousnessPct: number;
}

export interface ScoredSample {
  readonly timestamp: number; // seconds from the start of the clip or session
  readonly confidencePct: number;
  readonly nervousnessPct: number;
  readonly dominantEmotion: EmotionLabel;
  readonly rawEmotions: Readonly<EmotionVector>;
}

// ─── Statistics & Reports ───────────────────────────────────────────────────────

export interface StatsSummary {
  sampleCount: number;
  confidenceMedian: number;
  confidenceMean: number;
  confidenceStd: number;
  confidenceMax: number;
  confidenceMin: number;
  nervousnessMedian: number;
  nervousnessMean: number;
  nervousnessStd: number;
  nervousnessMax: number;
  nervousnessMin: number;
  totalDuration: number; // max timestamp, seconds
  dominantEmotionOverall: EmotionLabel;
}

export type AnalysisMode = "batch" | "stream";

export type AssessmentLevel = "High" | "Medium" | "Low";

export interface EmotionBreakdownEntry {
  label: EmotionLabel;
  mean: number;
  peak: number;
}

export interface Assessment {
  confidenceLevel: AssessmentLevel;
  nervousnessLevel: AssessmentLevel;
  confidenceDescription: string;
  nervousnessDescription: string;
  stabilityDescription: string;
}

export interface SessionInfo {
  sampleCount: number;
  durationSeconds: number;
  analysisRateHz: number;
  startedAt: string | null; // ISO 8601, stream sessions only
  endedAt: string | null;
}

export interface Report {
  mode: AnalysisMode;
  source: string | null;
  generatedAt: string;
  sessionInfo: SessionInfo;
  summary: StatsSummary;
  emotionBreakdown: EmotionBreakdownEntry[];
  assessment: Assessment;
}

/** Plot-ready series; the server never renders charts itself. */
export interface ChartSeries {
  timestamps: number[];
  confidence: number[];
  nervousness: number[];
  confidenceMedian: number;
  nervousnessMedian: number;
  emotionMeans: EmotionVector;
}

// ─── External Boundaries ────────────────────────────────────────────────────────

/** One vector per detected face; a single vector when the classifier does not list faces. */
export type ClassifierResult = EmotionVector | EmotionVector[];

export interface EmotionClassifier {
  classify(frame: Buffer): Promise<ClassifierResult>;
}

/** Finite, seekable source (a recorded clip). */
export interface VideoSource {
  readonly fps: number;
  readonly frameCount: number;
  /** Frame nearest to `timeSeconds`, or null at end of stream. Throws FrameReadError on failure. */
  seekAndRead(timeSeconds: number): Promise<Buffer | null>;
  release(): void;
}

/** Live, non-seekable source (a camera). */
export interface LiveSource {
  /** Next frame. Throws FrameReadError on failure. */
  read(): Promise<Buffer>;
  release(): void;
}

export type VideoSourceOpener = (path: string) => Promise<VideoSource>;
export type LiveSourceOpener = (deviceIndex: number) => Promise<LiveSource>;

// ─── Stream State Machine ───────────────────────────────────────────────────────

export enum StreamState {
  IDLE = "idle",
  RUNNING = "running",
  RESETTING = "resetting",
  STOPPED = "stopped",
}

export interface StreamSampleEvent {
  frame: Buffer;
  sample: ScoredSample;
  window: readonly ScoredSample[];
}

export interface StreamObserver {
  onSample?(event: StreamSampleEvent): void;
  onStateChange?(state: StreamState): void;
  onError?(message: string): void;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

// ─── Export ─────────────────────────────────────────────────────────────────────

export type ExportStatus =
  | { ok: true; paths: string[] }
  | { ok: false; message: string };

// ─── Wire Protocol ──────────────────────────────────────────────────────────────

export interface FrameHeader {
  timestamp: number; // seconds, client clock
  seq: number;
  width: number;
  height: number;
}

export type ClientMessage =
  | { type: "start_stream" }
  | { type: "stop_stream" }
  | { type: "reset_stream" }
  | { type: "generate_report" }
  | { type: "begin_upload"; fps: number; frameCount: number; fileName?: string }
  | { type: "analyze_upload" }
  | { type: "save_outputs" };

export type ServerMessage =
  | { type: "stream_state"; state: StreamState }
  | { type: "sample"; sample: ScoredSample; window: readonly ScoredSample[] }
  | { type: "progress"; percentage: number; message: string }
  | { type: "log"; message: string }
  | { type: "analysis_complete"; summary: StatsSummary; report: Report; chart: ChartSeries }
  | { type: "report"; report: Report }
  | { type: "outputs_saved"; paths: string[] }
  | { type: "export_failed"; message: string }
  | { type: "error"; message: string; recoverable: boolean };
